/**
 * Helpers shared by the chunking commands
 */

import { loadConfig, toChunkingOptions } from '../../config/index.js';
import type { ChunkDocumentOptions } from '../../chunker/index.js';
import type { CommandContext } from '../types.js';

/**
 * Engine options from the active config file (--config or the default).
 * A missing default file means built-in defaults; nothing is written.
 */
export function loadEngineOptions(ctx: CommandContext): ChunkDocumentOptions {
  const config = loadConfig(false, ctx.options.config);
  ctx.debug(`Config: ${ctx.options.config ?? 'default location'}`);
  return toChunkingOptions(config);
}

/**
 * `start-end` display of a line range
 */
export function formatLines(start: number, end: number): string {
  return start === end ? String(start) : `${start}-${end}`;
}
