/**
 * Error handling module for xslchunk
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: xslchunk config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DocumentError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  toErrorOutput,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
