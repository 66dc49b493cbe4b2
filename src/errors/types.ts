/**
 * Error type definitions for xslchunk
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all xslchunk errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: lets scripts handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - min_chunk_tokens larger than max_chunk_tokens
 * - Invalid config option names
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: xslchunk config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a document cannot be chunked at all: the input is empty,
 * whitespace only, or could not be read.
 *
 * This is the only fatal error of the chunking engine. Oversized lines
 * and missing split points are reported as chunk flags instead.
 *
 * Exit code 6: Document error
 */
export class DocumentError extends CLIError {
  /** Identifier of the offending document (file path or label) */
  public readonly source: string;

  constructor(message: string, source: string) {
    super(message, 'Check that the input is a non-empty stylesheet', 6);
    this.name = 'DocumentError';
    this.source = source;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
