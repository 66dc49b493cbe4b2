/**
 * Tests for chunking option resolution
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CHUNKING_OPTIONS,
  HELPER_PATTERNS,
  estimateTokens,
  resolveChunkingOptions,
  isValidPattern,
} from '../config.js';
import { ValidationError } from '../../errors/index.js';

describe('resolveChunkingOptions', () => {
  it('returns the defaults for no options', () => {
    expect(resolveChunkingOptions()).toEqual({ ...DEFAULT_CHUNKING_OPTIONS, priorities: undefined });
  });

  it('uses the documented defaults', () => {
    const options = resolveChunkingOptions();

    expect(options.maxChunkTokens).toBe(15000);
    expect(options.minChunkTokens).toBe(1500);
    expect(options.overlap).toEqual({ targetLines: 5, mode: 'fixed', ratio: 0.05, toleranceTokens: 0 });
    expect(options.charsPerToken).toBe(4);
    expect(options.helperPatterns).toEqual([HELPER_PATTERNS.mapforce]);
  });

  it('merges partial overlap settings over the defaults', () => {
    const options = resolveChunkingOptions({ overlap: { mode: 'proportional' } });

    expect(options.overlap).toEqual({
      targetLines: 5,
      mode: 'proportional',
      ratio: 0.05,
      toleranceTokens: 0,
    });
  });

  it('rejects a minimum above the maximum', () => {
    expect(() => resolveChunkingOptions({ maxChunkTokens: 100, minChunkTokens: 200 })).toThrow(
      ValidationError
    );
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      resolveChunkingOptions({ maxChunkTokens: 0, minChunkTokens: 0, helperPatterns: ['(unclosed'] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: 'Invalid chunking options',
      issues: [
        'maxChunkTokens: Number must be greater than or equal to 1',
        'helperPatterns.0: Invalid regular expression',
      ],
    });
  });
});

describe('isValidPattern', () => {
  it('accepts compiling helper patterns only', () => {
    expect(isValidPattern('(?:vmf:)?vmf\\d+')).toBe(true);
    expect(isValidPattern('(unclosed')).toBe(false);
  });
});

describe('estimateTokens', () => {
  it('rounds up', () => {
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens('abcde', 5)).toBe(1);
    expect(estimateTokens('')).toBe(0);
  });
});
