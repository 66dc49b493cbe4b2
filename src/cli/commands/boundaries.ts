/**
 * Boundaries Command
 *
 * Shows where the engine would be willing to split a stylesheet: the
 * aggregated boundary candidates of a line range, and the constructs the
 * detectors declined to classify.
 *
 *   xslchunk boundaries orders.xsl
 *   xslchunk boundaries orders.xsl --from 120 --to 480 --json
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import {
  analyzeBoundaries,
  findTopLevelUnits,
  LineIndexedDocument,
  splitLineOf,
  type BoundaryAnalysis,
  type LineRange,
} from '../../chunker/index.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import type { CommandContext } from '../types.js';
import { BoundariesOptionsSchema, parseInput } from '../validation.js';
import { formatLines, loadEngineOptions } from './shared.js';

/**
 * Command-specific options parsed from CLI arguments.
 */
interface BoundariesCommandOptions {
  from?: string;
  to?: string;
}

const CANDIDATE_COLUMNS: Column[] = [
  { header: 'Line', key: 'line', align: 'right' },
  { header: 'Split', key: 'split', align: 'right' },
  { header: 'Kind', key: 'kind' },
  { header: 'Priority', key: 'priority', align: 'right' },
  { header: 'Label', key: 'label', maxWidth: 60 },
];

const UNIT_COLUMNS: Column[] = [
  { header: 'Unit', key: 'id' },
  { header: 'Lines', key: 'lines', align: 'right' },
  { header: 'Type', key: 'type' },
  { header: 'Name', key: 'name', maxWidth: 40 },
];

/**
 * Range to analyze, checked against the document
 */
export function resolveRange(document: LineIndexedDocument, from?: number, to?: number): LineRange {
  const range = { start: from ?? 1, end: to ?? document.lineCount };
  if (!document.contains(range)) {
    throw new ValidationError(`Line range ${range.start}-${range.end} is outside the document`, [
      `${document.source} has ${document.lineCount} lines`,
    ]);
  }
  return range;
}

function displayAnalysis(
  ctx: CommandContext,
  document: LineIndexedDocument,
  analysis: BoundaryAnalysis,
  helperPatterns: readonly string[]
): void {
  const { range, candidates, ambiguities } = analysis;

  ctx.log(chalk.bold(document.source) + chalk.dim(`  lines ${formatLines(range.start, range.end)}`));

  const units = findTopLevelUnits(document, helperPatterns).filter(
    (unit) => unit.range.end >= range.start && unit.range.start <= range.end
  );
  ctx.log(
    formatTable(
      UNIT_COLUMNS,
      units.map((unit) => ({
        id: unit.id,
        lines: formatLines(unit.range.start, unit.range.end),
        type: unit.type,
        name: unit.name,
      }))
    )
  );
  ctx.log('');

  if (candidates.length === 0) {
    ctx.log(chalk.yellow('No boundary candidates in this range'));
  } else {
    ctx.log(
      formatTable(
        CANDIDATE_COLUMNS,
        candidates.map((candidate) => ({
          line: candidate.line,
          split: splitLineOf(candidate),
          kind: candidate.kind,
          priority: candidate.priority,
          label: candidate.label,
        }))
      )
    );
  }

  if (ambiguities.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim(`Omitted (${ambiguities.length}):`));
    for (const ambiguity of ambiguities) {
      ctx.log(chalk.dim(`  ${ambiguity.line}  ${ambiguity.detector}: ${ambiguity.reason}`));
    }
  }
}

/**
 * Create the boundaries command.
 *
 * @param getContext - Factory to get command context with global options
 * @returns Configured Commander command
 */
export function createBoundariesCommand(getContext: () => CommandContext): Command {
  return new Command('boundaries')
    .argument('<file>', 'Stylesheet to analyze')
    .description('List the split points the detectors find in a stylesheet')
    .option('--from <line>', 'First line of the range (default: 1)')
    .option('--to <line>', 'Last line of the range (default: last line)')
    .action(async (file: string, cmdOptions: BoundariesCommandOptions) => {
      const ctx = getContext();
      const { from, to } = parseInput(BoundariesOptionsSchema, cmdOptions);

      if (!existsSync(file)) {
        throw new FileNotFoundError(file);
      }

      const engineOptions = loadEngineOptions(ctx);
      const document = new LineIndexedDocument(await readFile(file, 'utf-8'), file);
      const range = resolveRange(document, from, to);
      const analysis = analyzeBoundaries(document, range, engineOptions);

      ctx.debug(`${analysis.candidates.length} candidates, ${analysis.ambiguities.length} omitted`);

      if (ctx.options.json) {
        console.log(JSON.stringify({ file, ...analysis }, null, 2));
      } else {
        displayAnalysis(ctx, document, analysis, engineOptions.helperPatterns ?? []);
      }
    });
}
