/**
 * Config Command
 *
 * Manages ~/.xslchunk/config.toml (or the file named by --config):
 *   xslchunk config get <key>          - Get a specific value
 *   xslchunk config set <key> <value>  - Set a value
 *   xslchunk config list               - Show all configuration
 *   xslchunk config path               - Show config file location
 *   xslchunk config reset --force      - Restore the default file
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  getConfigPath,
  getConfigValue,
  listConfig,
  resetConfig,
  setConfigValue,
} from '../../config/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // xslchunk config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., xslchunk config get chunking.max_chunk_tokens)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key, ctx.options.config);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('xslchunk config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // xslchunk config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., xslchunk config set chunking.overlap_target_lines 3)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value, ctx.options.config);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key, ctx.options.config) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // xslchunk config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig(ctx.options.config);

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));

        // Group by section for readability
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.')[0] ?? '';
          if (group !== currentGroup) {
            ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${ctx.options.config ?? getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // xslchunk config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = ctx.options.config ?? getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // xslchunk config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        resetConfig(ctx.options.config);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Report config errors without aborting the process
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  ctx.error(message);
  process.exitCode = 1;
}
