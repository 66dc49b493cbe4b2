/**
 * Configuration Schema
 *
 * Defines the shape of ~/.xslchunk/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

import { DetectorNameSchema, isValidPattern } from '../chunker/config.js';

/**
 * Chunking configuration
 * Token budgets and the overlap policy between sub-chunks
 */
export const ChunkingConfigSchema = z
  .object({
    max_chunk_tokens: z
      .number()
      .int()
      .min(1)
      .describe('Upper bound on a chunk\'s own lines, in estimated tokens'),
    min_chunk_tokens: z
      .number()
      .int()
      .min(0)
      .describe('Smallest segment the splitter will cut before a boundary'),
    overlap_target_lines: z
      .number()
      .int()
      .min(0)
      .max(1000)
      .describe('Lines repeated from the previous sub-chunk (hard cap)'),
    overlap_mode: z
      .enum(['fixed', 'proportional'])
      .describe('fixed uses overlap_target_lines; proportional scales with the previous chunk'),
    overlap_ratio: z
      .number()
      .min(0)
      .max(1)
      .describe('Fraction of the previous chunk\'s lines, for proportional mode'),
    overlap_tolerance_tokens: z
      .number()
      .int()
      .min(0)
      .describe('Tokens the overlap may add beyond max_chunk_tokens'),
    chars_per_token: z
      .number()
      .positive()
      .describe('Characters per estimated token'),
  })
  .strict();

/**
 * Detection configuration
 * Which detectors run and how helper templates are recognised
 */
export const DetectionConfigSchema = z
  .object({
    helper_patterns: z
      .array(z.string())
      .describe('Regular expressions matching helper template names'),
    detectors: z
      .array(DetectorNameSchema)
      .describe('Boundary detectors to run when splitting'),
  })
  .strict();

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z
  .object({
    chunking: ChunkingConfigSchema,
    detection: DetectionConfigSchema,
  })
  .strict()
  .refine((config) => config.chunking.min_chunk_tokens <= config.chunking.max_chunk_tokens, {
    message: 'min_chunk_tokens must not exceed max_chunk_tokens',
    path: ['chunking', 'min_chunk_tokens'],
  })
  .refine((config) => config.detection.helper_patterns.every(isValidPattern), {
    message: 'Invalid regular expression',
    path: ['detection', 'helper_patterns'],
  });

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type DetectionConfig = z.infer<typeof DetectionConfigSchema>;
