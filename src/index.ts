/**
 * xslchunk - Library Entry Point
 *
 * Chunk large XSLT stylesheets into budget-sized pieces that never cut
 * through a template, a loop or a conditional unless nothing else fits.
 *
 * ## CLI
 *
 * ```bash
 * xslchunk chunk mapping.xsl              # Table of chunks
 * xslchunk chunk mapping.xsl --json       # Chunk records as JSON
 * xslchunk boundaries mapping.xsl         # Split points the detectors find
 * ```
 *
 * @example Chunk text in memory
 * ```typescript
 * import { chunkText } from 'xslchunk';
 *
 * const chunks = chunkText(stylesheet, 'mapping.xsl', { maxChunkTokens: 8000 });
 * for (const chunk of chunks) {
 *   console.log(chunk.id, chunk.start_line, chunk.end_line, chunk.token_estimate);
 * }
 * ```
 *
 * @example Chunk files with per-file results
 * ```typescript
 * import { chunkFilesWithResult, consoleLogger } from 'xslchunk';
 *
 * const result = await chunkFilesWithResult(['a.xsl', 'b.xsl'], { logger: consoleLogger });
 * console.log(`${result.totalChunks} chunks, ${result.failureCount} failures`);
 * ```
 *
 * @packageDocumentation
 */

// Chunking engine
export * from './chunker/index.js';

// Configuration file
export {
  loadConfig,
  toChunkingOptions,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
} from './config/index.js';

// Errors
export {
  CLIError,
  ConfigError,
  DocumentError,
  FileNotFoundError,
  ValidationError,
} from './errors/index.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCollectingLogger,
  type Logger,
  type CollectingLogger,
} from './utils/logger.js';
