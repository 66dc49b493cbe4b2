/**
 * Size Estimator
 *
 * Token estimate for any line range: characters / charsPerToken, rounded
 * up. Character counts come from the document's line offsets, so sizing
 * a range never copies text.
 *
 * The estimate is monotonic: extending a range's end never lowers it.
 * The splitter's binary search relies on this.
 */

import { CHARS_PER_TOKEN } from './config.js';
import type { LineIndexedDocument } from './document.js';
import type { LineRange } from './types.js';

export interface SizeEstimator {
  /** Estimated tokens of start..end (inclusive); 0 for an empty range */
  estimate(range: LineRange): number;
}

export function createSizeEstimator(
  document: LineIndexedDocument,
  charsPerToken: number = CHARS_PER_TOKEN
): SizeEstimator {
  return {
    estimate(range: LineRange): number {
      if (range.end < range.start) {
        return 0;
      }
      return Math.ceil(document.charCount(range) / charsPerToken);
    },
  };
}

export { estimateTokens } from './config.js';
