/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class instantiation and properties
 * - Error formatting (text and JSON)
 * - Exit code extraction
 * - Verbose mode (stack traces)
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DocumentError,
  ValidationError,
  formatError,
  toErrorOutput,
  getExitCode,
  handleError,
} from '../index.js';
import { stripAnsi } from '../../utils/table.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with message and hint', () => {
      const error = new CLIError('Something went wrong', 'Try this instead');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBe('Try this instead');
      expect(error.code).toBe(1);
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });

    it('has stack trace', () => {
      const error = new CLIError('test');

      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('CLIError');
    });
  });

  describe('FileNotFoundError', () => {
    it('creates error with path', () => {
      const error = new FileNotFoundError('/path/to/file');

      expect(error.message).toBe('Path does not exist: /path/to/file');
      expect(error.hint).toBe('Check the path and try again');
      expect(error.code).toBe(3);
      expect(error.name).toBe('FileNotFoundError');
    });

    it('is instanceof CLIError', () => {
      const error = new FileNotFoundError('/test');

      expect(error).toBeInstanceOf(CLIError);
      expect(error).toBeInstanceOf(FileNotFoundError);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint', () => {
      const error = new ConfigError('Invalid option');

      expect(error.message).toBe('Invalid option');
      expect(error.hint).toBe('Run: xslchunk config list  to see valid options');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
    });

    it('creates error with custom hint', () => {
      const error = new ConfigError('Invalid option', 'Custom hint');

      expect(error.hint).toBe('Custom hint');
    });
  });

  describe('DocumentError', () => {
    it('creates error with source', () => {
      const error = new DocumentError('Document is empty: orders.xsl', 'orders.xsl');

      expect(error.message).toBe('Document is empty: orders.xsl');
      expect(error.source).toBe('orders.xsl');
      expect(error.hint).toBe('Check that the input is a non-empty stylesheet');
      expect(error.code).toBe(6);
      expect(error.name).toBe('DocumentError');
    });

    it('is instanceof CLIError', () => {
      expect(new DocumentError('empty', '<memory>')).toBeInstanceOf(CLIError);
    });
  });

  describe('ValidationError', () => {
    it('creates error with issues', () => {
      const error = new ValidationError('Invalid input', [
        'name: Required',
        'age: Must be positive',
      ]);

      expect(error.message).toBe('Invalid input');
      expect(error.hint).toContain('name: Required');
      expect(error.hint).toContain('age: Must be positive');
      expect(error.issues).toHaveLength(2);
      expect(error.code).toBe(1);
      expect(error.name).toBe('ValidationError');
    });

    it('creates error without issues', () => {
      const error = new ValidationError('Invalid input');

      expect(error.hint).toBe('Check your input and try again');
      expect(error.issues).toHaveLength(0);
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats CLIError with hint', () => {
      const error = new CLIError('Failed', 'Try again');
      const output = formatError(error);

      expect(output).toContain('Error:');
      expect(output).toContain('Failed');
      expect(output).toContain('Hint:');
      expect(output).toContain('Try again');
    });

    it('formats CLIError without hint', () => {
      const error = new CLIError('Failed');
      const output = formatError(error);

      expect(output).toContain('Error:');
      expect(output).toContain('Failed');
      expect(output).not.toContain('Hint:');
    });

    it('formats standard Error with verbose hint', () => {
      const error = new Error('Something broke');
      const output = formatError(error);

      expect(output).toContain('Error:');
      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('shows stack trace in verbose mode', () => {
      const error = new CLIError('Failed', 'Try again');
      const output = formatError(error, { verbose: true });

      expect(output).toContain('Stack trace:');
      expect(output).toContain('CLIError');
    });

    it('names the document of a DocumentError', () => {
      const output = stripAnsi(formatError(new DocumentError('Document is empty: a.xsl', 'a.xsl')));

      expect(output).toBe(
        'Error: Document is empty: a.xsl\nDocument: a.xsl\nHint: Check that the input is a non-empty stylesheet'
      );
    });

    it('lists validation issues in the hint', () => {
      const output = stripAnsi(formatError(new ValidationError('Invalid command options', ['maxTokens: Expected a whole number'])));

      expect(output).toBe(
        'Error: Invalid command options\nHint: Issues:\n  maxTokens: Expected a whole number'
      );
    });

    it('formats unknown error types', () => {
      const output = formatError('string error');

      expect(output).toContain('Error:');
      expect(output).toContain('string error');
    });
  });

  describe('JSON output', () => {
    it('formats CLIError as JSON', () => {
      const error = new ConfigError('Bad config', 'Fix it');
      const output = formatError(error, { json: true });
      const parsed = JSON.parse(output);

      expect(parsed.error).toBe('Bad config');
      expect(parsed.code).toBe(2);
      expect(parsed.hint).toBe('Fix it');
      expect(parsed.stack).toBeUndefined();
    });

    it('includes stack in JSON verbose mode', () => {
      const error = new CLIError('Failed');
      const output = formatError(error, { json: true, verbose: true });
      const parsed = JSON.parse(output);

      expect(parsed.stack).toBeDefined();
      expect(parsed.stack).toContain('CLIError');
    });

    it('formats standard Error as JSON', () => {
      const error = new Error('Oops');
      const output = formatError(error, { json: true });
      const parsed = JSON.parse(output);

      expect(parsed.error).toBe('Oops');
      expect(parsed.code).toBe(1);
    });

    it('includes source and issues in JSON', () => {
      expect(JSON.parse(formatError(new DocumentError('empty', 'a.xsl'), { json: true })).source).toBe('a.xsl');
      expect(JSON.parse(formatError(new ValidationError('bad', ['x: y']), { json: true })).issues).toEqual(['x: y']);
      expect(JSON.parse(formatError(new ValidationError('bad'), { json: true })).issues).toBeUndefined();
    });

    it('formats unknown error as JSON', () => {
      const output = formatError(42, { json: true });
      const parsed = JSON.parse(output);

      expect(parsed.error).toBe('42');
      expect(parsed.code).toBe(1);
    });
  });
});

describe('toErrorOutput', () => {
  it('describes CLI errors, plain errors and other values', () => {
    expect(toErrorOutput(new ValidationError('Invalid command options', ['maxTokens: bad']))).toEqual({
      error: 'Invalid command options',
      code: 1,
      hint: 'Issues:\n  maxTokens: bad',
      source: undefined,
      issues: ['maxTokens: bad'],
      stack: undefined,
    });
    expect(toErrorOutput(new Error('Oops'))).toEqual({ error: 'Oops', code: 1, stack: undefined });
    expect(toErrorOutput(7)).toEqual({ error: '7', code: 1 });
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new FileNotFoundError('/x'))).toBe(3);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new DocumentError('empty', 'a.xsl'))).toBe(6);
    expect(getExitCode(new ValidationError('bad'))).toBe(1);
  });

  it('returns 1 for standard Error', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
  });

  it('returns 1 for unknown types', () => {
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(null)).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to stderr and exits with the error code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });

    expect(() => handleError(new ConfigError('Bad config', 'Fix it'))).toThrow('exit');
    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(stripAnsi(String(errorSpy.mock.calls[0]?.[0]))).toBe('Error: Bad config\nHint: Fix it');
  });
});
