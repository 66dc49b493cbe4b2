/**
 * Chunker Types
 *
 * Type definitions for the stylesheet chunking engine: line ranges,
 * boundary candidates, split segments and the emitted chunk records.
 */

import type { Logger } from '../utils/logger.js';

/**
 * Inclusive, 1-indexed range of document lines.
 */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * Structural boundary classes found by the detectors.
 *
 * Every kind except unit_end opens a new segment at its own line;
 * unit_end closes the current segment, so the split falls on the next line.
 */
export type BoundaryKind =
  | 'unit_start'
  | 'unit_end'
  | 'output_element_open'
  | 'repetition_start'
  | 'variable_cluster_start'
  | 'conditional_block_start';

/**
 * A line judged safe to split on.
 */
export interface BoundaryCandidate {
  /** Line of the construct (1-indexed, within the document) */
  line: number;
  kind: BoundaryKind;
  /** Higher wins when several kinds share a split line */
  priority: number;
  /** Human-readable description, e.g. `<xsl:for-each select="Order">` */
  label: string;
}

/**
 * A construct a detector declined to classify.
 *
 * Ambiguities are recovered by omitting the candidate; they are surfaced
 * only for diagnostics.
 */
export interface BoundaryAmbiguity {
  detector: DetectorName;
  line: number;
  reason: string;
}

export interface DetectionResult {
  candidates: BoundaryCandidate[];
  ambiguities: BoundaryAmbiguity[];
}

export type DetectorName =
  | 'unit'
  | 'output_element'
  | 'repetition'
  | 'variable_cluster'
  | 'conditional';

/**
 * How a segment edge came to be.
 * - range_edge: first or last line of the range being split
 * - boundary: coincides with a detected boundary candidate
 * - fallback: hard split with no candidate at that line
 */
export type SplitReason = 'range_edge' | 'boundary' | 'fallback';

/**
 * One piece of a split range, before overlap is applied.
 */
export interface SplitSegment {
  range: LineRange;
  /** Token estimate of the range alone */
  tokens: number;
  startsAt: SplitReason;
  endsAt: SplitReason;
  /** Candidate the segment starts at, when startsAt is 'boundary' */
  boundary?: BoundaryCandidate;
  /** A single line that alone exceeds the budget */
  isBudgetExceeded: boolean;
}

/**
 * Classification of a top-level unit.
 * - main_template: named or match template that is not a helper
 * - helper_template: template whose name matches a helper pattern
 * - function: xsl:function
 * - top_level: lines between units (imports, global declarations,
 *   stylesheet open/close)
 * - document: the whole stylesheet, when it fits the budget as one chunk
 */
export type UnitType = 'main_template' | 'helper_template' | 'function' | 'top_level' | 'document';

/**
 * A top-level structural unit of the whole document.
 */
export interface TopLevelUnit {
  id: string;
  type: UnitType;
  /** Template/function name, or `match:<pattern>` for match templates */
  name?: string;
  range: LineRange;
}

/**
 * Whole-unit chunk or one sub-segment of an oversized unit.
 */
export type ChunkKind = 'unit' | 'sub_segment';

/**
 * Final chunk handed to downstream consumers.
 */
export interface Chunk {
  /** Stable id, `chunk_000` in emission order */
  id: string;

  kind: ChunkKind;

  /** Raw text of start_line..end_line, overlap included */
  content: string;

  /** First line including overlap (1-indexed) */
  start_line: number;

  /** Last line (1-indexed, inclusive) */
  end_line: number;

  token_estimate: number;

  /** Leading lines shared with the previous chunk of the same unit */
  overlap_with_previous: number;

  parent_unit_id: string;

  /** Position within the parent unit (0-indexed) */
  sequence_index: number;

  /** An edge of this chunk is a hard split with no boundary candidate */
  is_boundary_fallback: boolean;

  /** The chunk's own lines exceed max_chunk_tokens */
  is_budget_exceeded: boolean;

  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  unitType: UnitType;

  /** Name of the parent unit, when it has one */
  name?: string;

  /** Position of this chunk in the whole document (0-indexed) */
  chunkIndex: number;

  /** Total number of chunks emitted for the document */
  totalChunks: number;

  /** Number of chunks the parent unit was split into */
  partCount: number;

  /** Boundary the sub-segment starts at */
  boundaryKind?: BoundaryKind;
  boundaryLabel?: string;

  /** `var:`, `template:` and `function:` references, sorted */
  dependencies: string[];

  hasChooseBlocks: boolean;
  hasVariables: boolean;
  hasXPath: boolean;

  /** 0-10, grows with choose blocks, declarations, XPath and length */
  complexityScore: number;
}

/**
 * Serializable chunk summary, without content or metadata.
 */
export interface ChunkRecord {
  id: string;
  kind: ChunkKind;
  start_line: number;
  end_line: number;
  token_estimate: number;
  overlap_with_previous: number;
  parent_unit_id: string;
  sequence_index: number;
  is_boundary_fallback: boolean;
  is_budget_exceeded: boolean;
}

export type OverlapMode = 'fixed' | 'proportional';

/**
 * Overlap between adjacent sub-chunks of one unit.
 */
export interface OverlapPolicy {
  /** Target (and hard cap) of duplicated lines */
  targetLines: number;
  mode: OverlapMode;
  /** Fraction of the previous chunk's lines, for proportional mode */
  ratio: number;
  /** Tokens the overlap may add beyond maxChunkTokens */
  toleranceTokens: number;
}

/**
 * Token budget for the splitter.
 */
export interface SizeBudget {
  maxTokens: number;
  minTokens: number;
}

/**
 * Fully resolved chunking options.
 */
export interface ChunkingOptions {
  maxChunkTokens: number;
  minChunkTokens: number;
  overlap: OverlapPolicy;
  charsPerToken: number;
  /** Regex sources identifying helper template names */
  helperPatterns: string[];
  /** Detectors to run when splitting */
  detectors: DetectorName[];
  /** Priority override per boundary kind */
  priorities?: Partial<Record<BoundaryKind, number>>;
}

/**
 * Caller-facing options: every field optional, merged over defaults.
 */
export interface ChunkDocumentOptions
  extends Partial<Omit<ChunkingOptions, 'overlap'>> {
  overlap?: Partial<OverlapPolicy>;
  /** Receives ambiguity (debug) and degraded-split (warn) messages */
  logger?: Logger;
}

/**
 * Why a file produced no chunks.
 * - empty: file is empty or whitespace only
 * - too_large: file exceeds MAX_FILE_SIZE
 * - read_error: file could not be read
 */
export type SkipReason = 'empty' | 'too_large' | 'read_error';

/**
 * Result of chunking one file.
 */
export interface FileChunkResult {
  filePath: string;
  /** Whether the file was read and chunked (empty files count as success) */
  success: boolean;
  chunks: Chunk[];
  skipReason?: SkipReason;
  error?: string;
  /** Degraded splits and other non-fatal conditions */
  warnings: string[];
}

/**
 * Result of chunking several files.
 */
export interface BatchChunkResult {
  files: FileChunkResult[];
  successCount: number;
  failureCount: number;
  totalChunks: number;
  warnings: string[];
  errors: string[];
}
