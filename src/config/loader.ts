/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.xslchunk)
 * 2. Load config.toml if it exists
 * 3. Merge with defaults (user values override defaults)
 * 4. Validate with Zod schema
 * 5. Provide type-safe access
 *
 * Every function takes an optional config path so the CLI's --config
 * flag (and tests) can point somewhere other than the default file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { z } from 'zod';

import type { ChunkDocumentOptions } from '../chunker/types.js';
import { ConfigError, FileNotFoundError } from '../errors/index.js';
import { CONFIG_TEMPLATE, DEFAULT_CONFIG } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigSchema, type Config } from './schema.js';

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return isRecord(value);
}

/**
 * Ensure the directory holding the config file exists
 */
function ensureConfigDir(configPath: string): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target
 * This handles nested objects properly (unlike Object.assign or spread)
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    // If both values are objects (not arrays, not null), recurse
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      // Direct assignment for primitives, arrays, or a section the defaults lack
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Format zod issues as an indented bullet list
 */
function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and parse the TOML file at configPath
 */
function readToml(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');

  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: xslchunk config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @param configPath - Config file to read; defaults to ~/.xslchunk/config.toml
 * @throws ConfigError if the file exists but is invalid
 * @throws FileNotFoundError if an explicit configPath does not exist
 */
export function loadConfig(createIfMissing = true, configPath?: string): Config {
  const resolvedPath = configPath ?? getConfigPath();

  // If config doesn't exist, either create it or just use defaults
  if (!fs.existsSync(resolvedPath)) {
    if (configPath !== undefined && !createIfMissing) {
      throw new FileNotFoundError(configPath);
    }
    if (createIfMissing) {
      ensureConfigDir(resolvedPath);
      fs.writeFileSync(resolvedPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readToml(resolvedPath);
  const validationResult = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, parsed));

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration in ${resolvedPath}:\n${formatIssues(validationResult.error)}`,
      'Run: xslchunk config reset --force  to restore defaults'
    );
  }

  return validationResult.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('chunking.max_chunk_tokens') => 15000
 */
export function getConfigValue(key: string, configPath?: string): unknown {
  const config = loadConfig(true, configPath);
  const parts = key.split('.');

  let current: unknown = config;
  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string, configPath?: string): void {
  const resolvedPath = configPath ?? getConfigPath();
  ensureConfigDir(resolvedPath);

  // Load existing config or start fresh
  const config: TOML.JsonMap = fs.existsSync(resolvedPath) ? readToml(resolvedPath) : {};

  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: xslchunk config list  to see available keys'
    );
  }

  // Walk (and create) the nested tables
  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }

  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const validationResult = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error)}`,
      'Run: xslchunk config list  to see current values and types'
    );
  }

  fs.writeFileSync(resolvedPath, TOML.stringify(config), 'utf-8');
}

const StringListSchema = z.array(z.string());

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, string lists (JSON syntax) and strings
 */
export function parseValue(value: string): boolean | number | string | string[] {
  // Boolean
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // List, e.g. ["unit", "repetition"]
  if (value.trim().startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      throw new ConfigError(
        `Invalid list value: ${value}`,
        'Write lists as JSON, e.g. \'["unit", "repetition"]\''
      );
    }
    const list = StringListSchema.safeParse(parsed);
    if (!list.success) {
      throw new ConfigError(`List values must be strings: ${value}`);
    }
    return list.data;
  }

  // String (default)
  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['chunking.max_chunk_tokens', 15000]
 */
export function listConfig(configPath?: string): Array<[string, unknown]> {
  const config = loadConfig(true, configPath);
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: ConfigRecord, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * Replace the config file with the default template
 */
export function resetConfig(configPath?: string): void {
  const resolvedPath = configPath ?? getConfigPath();

  if (fs.existsSync(resolvedPath)) {
    fs.unlinkSync(resolvedPath);
  }

  loadConfig(true, resolvedPath);
}

/**
 * Engine options described by a loaded config
 */
export function toChunkingOptions(config: Config): ChunkDocumentOptions {
  const { chunking, detection } = config;
  return {
    maxChunkTokens: chunking.max_chunk_tokens,
    minChunkTokens: chunking.min_chunk_tokens,
    overlap: {
      targetLines: chunking.overlap_target_lines,
      mode: chunking.overlap_mode,
      ratio: chunking.overlap_ratio,
      toleranceTokens: chunking.overlap_tolerance_tokens,
    },
    charsPerToken: chunking.chars_per_token,
    helperPatterns: detection.helper_patterns,
    detectors: detection.detectors,
  };
}
