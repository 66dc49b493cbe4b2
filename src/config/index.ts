/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `xslchunk config` commands.
 */

// Schema and types
export { ConfigSchema, ChunkingConfigSchema, DetectionConfigSchema } from './schema.js';
export type { Config, ChunkingConfig, DetectionConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  parseValue,
  toChunkingOptions,
} from './loader.js';

// Path constants (for direct access without function call)
export { XSLCHUNK_DIR, CONFIG_PATH, getConfigPath } from './paths.js';
