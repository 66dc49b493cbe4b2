/**
 * Centralized Path Definitions
 *
 * Single source of truth for xslchunk directory paths.
 *
 * Directory structure:
 * ~/.xslchunk/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const XSLCHUNK_DIR = join(homedir(), '.xslchunk');
export const CONFIG_PATH = join(XSLCHUNK_DIR, 'config.toml');

/**
 * Get the default config file path (~/.xslchunk/config.toml)
 */
export function getConfigPath(): string {
  return CONFIG_PATH;
}
