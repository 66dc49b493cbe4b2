/**
 * Chunk Assembler
 *
 * Entry point of the chunking engine. A document within budget becomes a
 * single chunk. Otherwise the engine walks its top-level units in order:
 * a unit that fits the budget becomes one chunk, while an oversized unit
 * goes through detection, aggregation, splitting and overlap and becomes
 * a run of sub-chunks sharing its parent id.
 *
 * The result always covers every line. Degraded splits are flagged on the
 * chunks (is_boundary_fallback, is_budget_exceeded), never thrown.
 */

import { silentLogger, type Logger } from '../utils/logger.js';
import { aggregateResults } from './aggregator.js';
import { resolveChunkingOptions } from './config.js';
import { runDetectors } from './detectors/index.js';
import { LineIndexedDocument } from './document.js';
import { createSizeEstimator, type SizeEstimator } from './estimator.js';
import { describeText } from './metadata.js';
import { computeOverlap } from './overlap.js';
import { splitRange } from './splitter.js';
import { documentUnit, findTopLevelUnits } from './units.js';
import type {
  BoundaryAmbiguity,
  BoundaryCandidate,
  Chunk,
  ChunkDocumentOptions,
  ChunkingOptions,
  ChunkKind,
  ChunkRecord,
  LineRange,
  TopLevelUnit,
} from './types.js';

/**
 * Chunk placement before ids and metadata are assigned.
 */
interface ChunkDraft {
  unit: TopLevelUnit;
  kind: ChunkKind;
  /** Lines owned by this chunk, overlap excluded */
  core: LineRange;
  overlap: number;
  sequenceIndex: number;
  partCount: number;
  isBoundaryFallback: boolean;
  isBudgetExceeded: boolean;
  boundary?: BoundaryCandidate;
}

/**
 * Boundary analysis of one range.
 */
export interface BoundaryAnalysis {
  range: LineRange;
  /** Aggregated candidates, ascending by split line */
  candidates: BoundaryCandidate[];
  /** Constructs the detectors declined to classify */
  ambiguities: BoundaryAmbiguity[];
}

/**
 * Chunk a document into budget-sized, structurally aligned pieces.
 *
 * @param document - The document to chunk
 * @param options - Budgets and policies, merged over the defaults
 * @returns Chunks in document order
 * @throws ValidationError if the options are invalid
 */
export function chunkDocument(
  document: LineIndexedDocument,
  options: ChunkDocumentOptions = {}
): Chunk[] {
  const resolved = resolveChunkingOptions(options);
  const logger = options.logger ?? silentLogger;
  const estimator = createSizeEstimator(document, resolved.charsPerToken);

  // A document within budget is never cut into units
  const units =
    estimator.estimate(document.fullRange) <= resolved.maxChunkTokens
      ? [documentUnit(document)]
      : findTopLevelUnits(document, resolved.helperPatterns);

  const drafts: ChunkDraft[] = [];
  for (const unit of units) {
    drafts.push(...planUnit(document, unit, estimator, resolved, logger));
  }

  return drafts.map((draft, index) => buildChunk(document, estimator, draft, index, drafts.length));
}

/**
 * Chunk raw text. Convenience wrapper around chunkDocument().
 *
 * @throws DocumentError if the text is empty
 */
export function chunkText(
  text: string,
  source: string = '<memory>',
  options: ChunkDocumentOptions = {}
): Chunk[] {
  return chunkDocument(new LineIndexedDocument(text, source), options);
}

/**
 * Run the enabled detectors over a range and aggregate what they find.
 */
export function analyzeBoundaries(
  document: LineIndexedDocument,
  range: LineRange = document.fullRange,
  options: Pick<ChunkDocumentOptions, 'detectors' | 'priorities'> = {}
): BoundaryAnalysis {
  const resolved = resolveChunkingOptions(options);
  const results = runDetectors(document, range, resolved.detectors);

  return {
    range,
    candidates: aggregateResults(results, { range, priorities: resolved.priorities }),
    ambiguities: results
      .flatMap((result) => result.ambiguities)
      .sort((a, b) => a.line - b.line || a.detector.localeCompare(b.detector)),
  };
}

function planUnit(
  document: LineIndexedDocument,
  unit: TopLevelUnit,
  estimator: SizeEstimator,
  options: ChunkingOptions,
  logger: Logger
): ChunkDraft[] {
  if (estimator.estimate(unit.range) <= options.maxChunkTokens) {
    return [
      {
        unit,
        kind: 'unit',
        core: unit.range,
        overlap: 0,
        sequenceIndex: 0,
        partCount: 1,
        isBoundaryFallback: false,
        isBudgetExceeded: false,
      },
    ];
  }

  const analysis = analyzeBoundaries(document, unit.range, options);
  for (const ambiguity of analysis.ambiguities) {
    logger.debug?.(
      `${document.source}:${ambiguity.line} ${ambiguity.detector} boundary omitted (${ambiguity.reason})`
    );
  }

  const segments = splitRange(unit.range, analysis.candidates, estimator, {
    maxTokens: options.maxChunkTokens,
    minTokens: options.minChunkTokens,
  });

  const overlapContext = {
    document,
    estimator,
    policy: options.overlap,
    maxTokens: options.maxChunkTokens,
  };

  return segments.map((segment, index) => {
    const previous = segments[index - 1];
    const overlap = previous ? computeOverlap(previous.range, segment.range, overlapContext) : 0;
    const isBoundaryFallback = segment.startsAt === 'fallback' || segment.endsAt === 'fallback';
    const { start, end } = segment.range;

    if (segment.isBudgetExceeded) {
      logger.warn(
        `${document.source}:${start} line alone is ~${segment.tokens} tokens, over the ${options.maxChunkTokens}-token budget`
      );
    } else if (isBoundaryFallback) {
      logger.warn(
        `${document.source}:${start}-${end} split without a structural boundary (${unit.id})`
      );
    }

    return {
      unit,
      kind: segments.length === 1 ? 'unit' : 'sub_segment',
      core: segment.range,
      overlap,
      sequenceIndex: index,
      partCount: segments.length,
      isBoundaryFallback,
      isBudgetExceeded: segment.isBudgetExceeded,
      boundary: segment.boundary,
    };
  });
}

function buildChunk(
  document: LineIndexedDocument,
  estimator: SizeEstimator,
  draft: ChunkDraft,
  index: number,
  total: number
): Chunk {
  const range = { start: draft.core.start - draft.overlap, end: draft.core.end };
  const content = document.slice(range);

  return {
    id: `chunk_${String(index).padStart(3, '0')}`,
    kind: draft.kind,
    content,
    start_line: range.start,
    end_line: range.end,
    token_estimate: estimator.estimate(range),
    overlap_with_previous: draft.overlap,
    parent_unit_id: draft.unit.id,
    sequence_index: draft.sequenceIndex,
    is_boundary_fallback: draft.isBoundaryFallback,
    is_budget_exceeded: draft.isBudgetExceeded,
    metadata: {
      unitType: draft.unit.type,
      name: draft.unit.name,
      chunkIndex: index,
      totalChunks: total,
      partCount: draft.partCount,
      boundaryKind: draft.boundary?.kind,
      boundaryLabel: draft.boundary?.label,
      ...describeText(content),
    },
  };
}

/**
 * Serializable summary of a chunk (no content, no metadata).
 */
export function toChunkRecord(chunk: Chunk): ChunkRecord {
  return {
    id: chunk.id,
    kind: chunk.kind,
    start_line: chunk.start_line,
    end_line: chunk.end_line,
    token_estimate: chunk.token_estimate,
    overlap_with_previous: chunk.overlap_with_previous,
    parent_unit_id: chunk.parent_unit_id,
    sequence_index: chunk.sequence_index,
    is_boundary_fallback: chunk.is_boundary_fallback,
    is_budget_exceeded: chunk.is_budget_exceeded,
  };
}
