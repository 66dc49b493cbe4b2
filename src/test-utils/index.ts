/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { stylesheet, template, toText } from '../../test-utils/index.js';
 *
 * const text = toText(stylesheet(template('name="main"', ['<Out/>'])));
 * ```
 */

export {
  XSL_NAMESPACE,
  toText,
  indent,
  stylesheet,
  template,
  outputBlock,
  outputBlocks,
  textLines,
  coreRange,
  chunksByUnit,
} from './stylesheets.js';

export { createTempDir, type TempDir } from './files.js';
