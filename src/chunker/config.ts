/**
 * Chunker Configuration
 *
 * Budgets, overlap policy, boundary priorities and helper-name patterns.
 * Values are passed explicitly into chunkDocument(); nothing here is
 * mutated at runtime.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import type {
  BoundaryKind,
  ChunkDocumentOptions,
  ChunkingOptions,
  DetectorName,
} from './types.js';

/**
 * Average characters per token for XML-heavy text.
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Maximum file size the file layer will read (5MB).
 */
export const MAX_FILE_SIZE = 5 * 1024 * 1024;

/**
 * Helper-template name patterns of common stylesheet generators.
 */
export const HELPER_PATTERNS = {
  /** MapForce generated helpers (vmf:vmf1_inputtoresult) */
  mapforce: '(?:vmf:)?vmf\\d+',
  /** Saxon-style helper functions (f:func1, func2) */
  saxon: '(?:f:)?func\\d+',
  /** Hand-written helpers (util:helper_name) */
  custom: '(?:util:)?helper[\\w_]*',
  generic: '(?:\\w+:)?(?:helper|util|fn)\\w*',
} as const;

/**
 * Split preference when several kinds share a line.
 * Unit boundaries are the safest place to split, variable clusters the least.
 */
export const BOUNDARY_PRIORITY: Record<BoundaryKind, number> = {
  unit_start: 5,
  unit_end: 5,
  output_element_open: 4,
  repetition_start: 3,
  conditional_block_start: 2,
  variable_cluster_start: 1,
};

export const DETECTOR_NAMES: readonly DetectorName[] = [
  'unit',
  'output_element',
  'repetition',
  'variable_cluster',
  'conditional',
];

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  maxChunkTokens: 15000,
  minChunkTokens: 1500,
  overlap: {
    targetLines: 5,
    mode: 'fixed',
    ratio: 0.05,
    toleranceTokens: 0,
  },
  charsPerToken: CHARS_PER_TOKEN,
  helperPatterns: [HELPER_PATTERNS.mapforce],
  detectors: [...DETECTOR_NAMES],
};

const BoundaryKindSchema = z.enum([
  'unit_start',
  'unit_end',
  'output_element_open',
  'repetition_start',
  'variable_cluster_start',
  'conditional_block_start',
]);

export const DetectorNameSchema = z.enum([
  'unit',
  'output_element',
  'repetition',
  'variable_cluster',
  'conditional',
]);

/**
 * Runtime validation of resolved options.
 */
export const ChunkingOptionsSchema = z
  .object({
    maxChunkTokens: z.number().int().min(1),
    minChunkTokens: z.number().int().min(0),
    overlap: z.object({
      targetLines: z.number().int().min(0),
      mode: z.enum(['fixed', 'proportional']),
      ratio: z.number().min(0).max(1),
      toleranceTokens: z.number().int().min(0),
    }),
    charsPerToken: z.number().positive(),
    helperPatterns: z.array(
      z.string().refine(isValidPattern, { message: 'Invalid regular expression' })
    ),
    detectors: z.array(DetectorNameSchema),
    priorities: z.record(BoundaryKindSchema, z.number()).optional(),
  })
  .refine((options) => options.minChunkTokens <= options.maxChunkTokens, {
    message: 'minChunkTokens must not exceed maxChunkTokens',
    path: ['minChunkTokens'],
  });

/**
 * Whether a helper pattern compiles as a regular expression
 */
export function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

/**
 * Merge caller options over the defaults and validate the result.
 *
 * @throws ValidationError listing every offending field
 */
export function resolveChunkingOptions(options: ChunkDocumentOptions = {}): ChunkingOptions {
  const defaults = DEFAULT_CHUNKING_OPTIONS;
  const overlap = options.overlap ?? {};

  const merged: ChunkingOptions = {
    maxChunkTokens: options.maxChunkTokens ?? defaults.maxChunkTokens,
    minChunkTokens: options.minChunkTokens ?? defaults.minChunkTokens,
    overlap: {
      targetLines: overlap.targetLines ?? defaults.overlap.targetLines,
      mode: overlap.mode ?? defaults.overlap.mode,
      ratio: overlap.ratio ?? defaults.overlap.ratio,
      toleranceTokens: overlap.toleranceTokens ?? defaults.overlap.toleranceTokens,
    },
    charsPerToken: options.charsPerToken ?? defaults.charsPerToken,
    helperPatterns: options.helperPatterns ?? defaults.helperPatterns,
    detectors: options.detectors ?? defaults.detectors,
    priorities: options.priorities,
  };

  const result = ChunkingOptionsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ValidationError('Invalid chunking options', issues);
  }

  return merged;
}

/**
 * Estimate token count from text.
 * Uses a simple heuristic: ~4 characters per token on average.
 *
 * Note: This is an approximation. The range estimator in estimator.ts
 * applies the same formula to line offsets without copying text.
 */
export function estimateTokens(text: string, charsPerToken: number = CHARS_PER_TOKEN): number {
  return Math.ceil(text.length / charsPerToken);
}
