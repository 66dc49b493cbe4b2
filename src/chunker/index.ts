/**
 * Chunker Module
 *
 * Semantic chunking of large stylesheets into budget-sized segments:
 * - Top-level units (templates, functions, top-level declarations)
 * - Oversized units split on structural boundaries
 * - Short overlap between sub-chunks of one unit
 *
 * Usage:
 * ```typescript
 * import { LineIndexedDocument, chunkDocument } from './chunker';
 *
 * const document = new LineIndexedDocument(text, 'orders.xsl');
 * const chunks = chunkDocument(document, { maxChunkTokens: 8000 });
 * ```
 */

// Engine entry points
export {
  chunkDocument,
  chunkText,
  analyzeBoundaries,
  toChunkRecord,
  type BoundaryAnalysis,
} from './assembler.js';

// File layer
export { chunkFileWithResult, chunkFilesWithResult, formatSize } from './chunker.js';

// Building blocks
export { LineIndexedDocument } from './document.js';
export { createSizeEstimator, type SizeEstimator } from './estimator.js';
export { aggregateBoundaries, aggregateResults, splitLineOf, type AggregateOptions } from './aggregator.js';
export { splitRange } from './splitter.js';
export { computeOverlap, overlapTarget, type OverlapContext } from './overlap.js';
export { documentUnit, findTopLevelUnits } from './units.js';
export { describeText, extractDependencies, complexityScore, type TextMetadata } from './metadata.js';
export {
  scanMarkup,
  describeRange,
  eventsInRange,
  attributeValue,
  tagLabel,
  type TagEvent,
  type TagType,
  type MarkupScan,
  type RangeContext,
} from './scanner.js';

// Detectors
export {
  DEFAULT_DETECTORS,
  runDetectors,
  detectUnitBoundaries,
  detectOutputElementBoundaries,
  detectRepetitionBoundaries,
  detectVariableClusters,
  detectConditionalBlocks,
  type BoundaryDetector,
} from './detectors/index.js';

// Types
export type {
  LineRange,
  BoundaryKind,
  BoundaryCandidate,
  BoundaryAmbiguity,
  DetectionResult,
  DetectorName,
  SplitReason,
  SplitSegment,
  UnitType,
  TopLevelUnit,
  ChunkKind,
  Chunk,
  ChunkMetadata,
  ChunkRecord,
  OverlapMode,
  OverlapPolicy,
  SizeBudget,
  ChunkingOptions,
  ChunkDocumentOptions,
  SkipReason,
  FileChunkResult,
  BatchChunkResult,
} from './types.js';

// Configuration
export {
  CHARS_PER_TOKEN,
  MAX_FILE_SIZE,
  HELPER_PATTERNS,
  BOUNDARY_PRIORITY,
  DETECTOR_NAMES,
  DEFAULT_CHUNKING_OPTIONS,
  ChunkingOptionsSchema,
  resolveChunkingOptions,
  isValidPattern,
  estimateTokens,
} from './config.js';
