/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode with stack traces
 */

import chalk from 'chalk';
import { CLIError, DocumentError, ValidationError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Document the error refers to (DocumentError only) */
  source?: string;
  /** Field-level problems (ValidationError only) */
  issues?: string[];
  stack?: string;
}

/**
 * JSON shape of any thrown value
 */
export function toErrorOutput(error: unknown, verbose = false): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      source: error instanceof DocumentError ? error.source : undefined,
      issues: error instanceof ValidationError && error.issues.length > 0 ? error.issues : undefined,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return { error: error.message, code: 1, stack: verbose ? error.stack : undefined };
  }
  return { error: String(error), code: 1 };
}

function stackTrace(error: Error): string[] {
  return error.stack ? ['', chalk.dim('Stack trace:'), chalk.dim(error.stack)] : [];
}

/**
 * Format an error for display.
 *
 * Kept apart from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (json) {
    return JSON.stringify(toErrorOutput(error, verbose), null, 2);
  }

  if (!(error instanceof Error)) {
    return chalk.red('Error: ') + String(error);
  }

  const lines = [chalk.red('Error: ') + error.message];

  if (error instanceof DocumentError) {
    lines.push(chalk.dim('Document: ') + error.source);
  }

  if (error instanceof CLIError) {
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
    if (verbose) {
      lines.push(...stackTrace(error));
    }
  } else if (verbose && error.stack) {
    lines.push(...stackTrace(error));
  } else {
    // Unexpected errors point at --verbose
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  // stdout is reserved for chunk output
  console.error(formatted);

  process.exit(code);
}

/**
 * Create a global error handler that can be attached to process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
