#!/usr/bin/env node
/**
 * xslchunk CLI Entry Point
 *
 * This is the main entry point for the `xslchunk` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createBoundariesCommand } from './commands/boundaries.js';
import { createChunkCommand } from './commands/chunk.js';
import { createConfigCommand } from './commands/config.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

const VERSION = process.env.XSLCHUNK_VERSION ?? '0.1.0';

// Create the root program
const program = new Command();

program
  .name('xslchunk')
  .description('Semantic chunking of large XSLT stylesheets for LLM pipelines')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('--config <path>', 'Config file to use instead of ~/.xslchunk/config.toml')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('xslchunk chunk mapping.xsl')}                   Chunk a stylesheet
  ${chalk.cyan('xslchunk chunk mapping.xsl --max-tokens 8000')}  Chunk with a smaller budget
  ${chalk.cyan('xslchunk chunk mapping.xsl --json')}             Emit chunk records as JSON
  ${chalk.cyan('xslchunk boundaries mapping.xsl --from 200')}    Show split points from line 200
  ${chalk.cyan('xslchunk config list')}                          Show all configuration
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    config: opts.config,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createChunkCommand(getContext));
program.addCommand(createBoundariesCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: xslchunk --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
