/**
 * Chunk Command
 *
 * Splits stylesheets into budget-sized chunks aligned on structural
 * boundaries and reports them as a table or as JSON records.
 *
 *   xslchunk chunk orders.xsl
 *   xslchunk chunk a.xsl b.xsl --max-tokens 8000 --overlap 3
 *   xslchunk chunk orders.xsl --json --with-content
 *
 * Settings come from the config file; the flags override them per run.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  chunkFilesWithResult,
  toChunkRecord,
  type BatchChunkResult,
  type Chunk,
  type ChunkDocumentOptions,
  type ChunkRecord,
  type FileChunkResult,
  type SkipReason,
} from '../../chunker/index.js';
import { formatTable, type Column, type Row } from '../../utils/table.js';
import type { CommandContext } from '../types.js';
import { ChunkArgsSchema, ChunkOptionsSchema, parseInput, type ChunkOptions } from '../validation.js';
import { formatLines, loadEngineOptions } from './shared.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface ChunkCommandOptions {
  maxTokens?: string;
  minTokens?: string;
  overlap?: string;
  withContent?: boolean;
}

/**
 * Chunk record in JSON output, optionally with its text and metadata
 */
export type ChunkOutput = ChunkRecord & Partial<Pick<Chunk, 'content' | 'metadata'>>;

export interface FileReport {
  filePath: string;
  success: boolean;
  skipReason?: SkipReason;
  error?: string;
  warnings: string[];
  chunks: ChunkOutput[];
}

export interface ChunkReport {
  files: FileReport[];
  summary: {
    files: number;
    succeeded: number;
    failed: number;
    chunks: number;
    warnings: number;
  };
}

// ============================================================================
// Constants
// ============================================================================

const SKIP_MESSAGES: Record<SkipReason, string> = {
  empty: 'empty file',
  too_large: 'file too large',
  read_error: 'could not be read',
};

const CHUNK_COLUMNS: Column[] = [
  { header: 'Chunk', key: 'id' },
  { header: 'Lines', key: 'lines', align: 'right' },
  { header: 'Tokens', key: 'tokens', align: 'right' },
  { header: 'Overlap', key: 'overlap', align: 'right' },
  { header: 'Unit', key: 'unit', maxWidth: 32 },
  { header: 'Part', key: 'part', align: 'right' },
  { header: 'Flags', key: 'flags' },
];

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Engine options: config file values, then command-line overrides.
 * A --max-tokens below the configured minimum pulls the minimum down with it.
 */
export function mergeOverrides(base: ChunkDocumentOptions, overrides: ChunkOptions): ChunkDocumentOptions {
  const { maxTokens, minTokens } = overrides;
  const configuredMin =
    maxTokens !== undefined && base.minChunkTokens !== undefined
      ? Math.min(base.minChunkTokens, maxTokens)
      : base.minChunkTokens;

  return {
    ...base,
    maxChunkTokens: maxTokens ?? base.maxChunkTokens,
    minChunkTokens: minTokens ?? configuredMin,
    overlap: {
      ...base.overlap,
      targetLines: overrides.overlap ?? base.overlap?.targetLines,
    },
  };
}

/**
 * JSON-ready report of a batch run
 */
export function buildChunkReport(batch: BatchChunkResult, withContent: boolean): ChunkReport {
  return {
    files: batch.files.map((file) => ({
      filePath: file.filePath,
      success: file.success,
      skipReason: file.skipReason,
      error: file.error,
      warnings: file.warnings,
      chunks: file.chunks.map((chunk) =>
        withContent
          ? { ...toChunkRecord(chunk), content: chunk.content, metadata: chunk.metadata }
          : toChunkRecord(chunk)
      ),
    })),
    summary: {
      files: batch.files.length,
      succeeded: batch.successCount,
      failed: batch.failureCount,
      chunks: batch.totalChunks,
      warnings: batch.warnings.length,
    },
  };
}

/**
 * Flag column text for a chunk
 */
export function chunkFlags(chunk: Chunk): string {
  const flags: string[] = [];
  if (chunk.is_boundary_fallback) flags.push('fallback');
  if (chunk.is_budget_exceeded) flags.push('over budget');
  return flags.join(', ');
}

function chunkRow(chunk: Chunk): Row {
  const unit = chunk.metadata.name ?? chunk.metadata.unitType;
  return {
    id: chunk.id,
    lines: formatLines(chunk.start_line, chunk.end_line),
    tokens: chunk.token_estimate,
    overlap: chunk.overlap_with_previous,
    unit: `${chunk.parent_unit_id} ${unit}`,
    part: `${chunk.sequence_index + 1}/${chunk.metadata.partCount}`,
    flags: chunkFlags(chunk),
  };
}

/**
 * Print one file's chunks as a table
 */
function displayFile(ctx: CommandContext, file: FileChunkResult, withContent: boolean): void {
  if (!file.success) {
    ctx.error(`${file.filePath}: ${file.error ?? 'failed'}`);
    return;
  }

  if (file.skipReason) {
    ctx.log(chalk.dim(`${file.filePath}: skipped (${SKIP_MESSAGES[file.skipReason]})`));
    return;
  }

  const totalTokens = file.chunks.reduce((sum, chunk) => sum + chunk.token_estimate, 0);

  ctx.log(chalk.bold(file.filePath) + chalk.dim(`  (${file.chunks.length} chunks)`));
  ctx.log(
    formatTable(CHUNK_COLUMNS, file.chunks.map(chunkRow), {
      footer: { id: 'total', tokens: totalTokens },
    })
  );

  if (withContent) {
    for (const chunk of file.chunks) {
      ctx.log('');
      ctx.log(chalk.cyan(`── ${chunk.id} (lines ${formatLines(chunk.start_line, chunk.end_line)}) ──`));
      ctx.log(chunk.content);
    }
  }
  ctx.log('');
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chunk command.
 *
 * @param getContext - Factory to get command context with global options
 * @returns Configured Commander command
 */
export function createChunkCommand(getContext: () => CommandContext): Command {
  return new Command('chunk')
    .argument('<files...>', 'Stylesheets to chunk')
    .description('Split stylesheets into structurally aligned chunks')
    .option('--max-tokens <number>', 'Token budget per chunk (overrides config)')
    .option('--min-tokens <number>', 'Smallest segment cut before a boundary (overrides config)')
    .option('--overlap <lines>', 'Lines repeated from the previous sub-chunk (overrides config)')
    .option('--with-content', 'Include chunk text (and metadata with --json)')
    .action(async (files: string[], cmdOptions: ChunkCommandOptions) => {
      const ctx = getContext();

      ctx.debug(`Files: ${files.join(', ')}`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const args = parseInput(ChunkArgsSchema, { files });
      const overrides = parseInput(ChunkOptionsSchema, cmdOptions);
      const options = mergeOverrides(loadEngineOptions(ctx), overrides);

      const batch = await chunkFilesWithResult(args.files, { ...options, logger: ctx }, (file) => {
        ctx.debug(`${file.filePath}: ${file.chunks.length} chunks`);
      });

      if (ctx.options.json) {
        console.log(JSON.stringify(buildChunkReport(batch, overrides.withContent), null, 2));
      } else {
        for (const file of batch.files) {
          displayFile(ctx, file, overrides.withContent);
        }

        const summary = `Chunked ${batch.successCount} of ${batch.files.length} file(s) into ${batch.totalChunks} chunks`;
        ctx.log(batch.failureCount > 0 ? chalk.yellow(summary) : chalk.green(summary));
        if (batch.warnings.length > 0) {
          ctx.log(chalk.dim(`${batch.warnings.length} warning(s); flagged chunks are marked in the Flags column`));
        }
      }

      if (batch.failureCount > 0) {
        process.exitCode = 1;
      }
    });
}
