/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import { DEFAULT_CHUNKING_OPTIONS } from '../chunker/config.js';
import type { Config } from './schema.js';

const { overlap } = DEFAULT_CHUNKING_OPTIONS;

/**
 * Default configuration, mirroring the engine's built-in options
 */
export const DEFAULT_CONFIG: Config = {
  chunking: {
    max_chunk_tokens: DEFAULT_CHUNKING_OPTIONS.maxChunkTokens,
    min_chunk_tokens: DEFAULT_CHUNKING_OPTIONS.minChunkTokens,
    overlap_target_lines: overlap.targetLines,
    overlap_mode: overlap.mode,
    overlap_ratio: overlap.ratio,
    overlap_tolerance_tokens: overlap.toleranceTokens,
    chars_per_token: DEFAULT_CHUNKING_OPTIONS.charsPerToken,
  },

  detection: {
    helper_patterns: [...DEFAULT_CHUNKING_OPTIONS.helperPatterns],
    detectors: [...DEFAULT_CHUNKING_OPTIONS.detectors],
  },
};

const tomlString = (value: string): string => JSON.stringify(value);
const tomlArray = (values: readonly string[]): string => `[${values.map(tomlString).join(', ')}]`;

/**
 * Config file template (TOML format)
 * Written to ~/.xslchunk/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# xslchunk Configuration
# Location: ~/.xslchunk/config.toml

# Chunking Settings
# Token estimates are characters / chars_per_token, rounded up
[chunking]
max_chunk_tokens = ${DEFAULT_CONFIG.chunking.max_chunk_tokens}
min_chunk_tokens = ${DEFAULT_CONFIG.chunking.min_chunk_tokens}
overlap_target_lines = ${DEFAULT_CONFIG.chunking.overlap_target_lines}
overlap_mode = ${tomlString(DEFAULT_CONFIG.chunking.overlap_mode)}   # or "proportional"
overlap_ratio = ${DEFAULT_CONFIG.chunking.overlap_ratio}
overlap_tolerance_tokens = ${DEFAULT_CONFIG.chunking.overlap_tolerance_tokens}
chars_per_token = ${DEFAULT_CONFIG.chunking.chars_per_token}

# Boundary Detection
# helper_patterns classify named templates as helper_template units
[detection]
helper_patterns = ${tomlArray(DEFAULT_CONFIG.detection.helper_patterns)}
detectors = ${tomlArray(DEFAULT_CONFIG.detection.detectors)}
`;
