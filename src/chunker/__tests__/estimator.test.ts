/**
 * Tests for the token size estimator
 */

import { describe, it, expect } from 'vitest';
import { LineIndexedDocument } from '../document.js';
import { createSizeEstimator, estimateTokens } from '../estimator.js';

describe('estimateTokens', () => {
  it('divides characters by four and rounds up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });

  it('accepts a custom ratio', () => {
    expect(estimateTokens('abcdefghi', 2)).toBe(5);
  });
});

describe('createSizeEstimator', () => {
  const doc = new LineIndexedDocument('abcd\nefgh\nij');

  it('estimates a single line', () => {
    const estimator = createSizeEstimator(doc);
    expect(estimator.estimate({ start: 1, end: 1 })).toBe(1);
  });

  it('counts inner line terminators', () => {
    const estimator = createSizeEstimator(doc);
    // "abcd\nefgh" = 9 characters
    expect(estimator.estimate({ start: 1, end: 2 })).toBe(3);
  });

  it('matches estimateTokens on the sliced text', () => {
    const estimator = createSizeEstimator(doc, 3);
    const range = { start: 1, end: 3 };
    expect(estimator.estimate(range)).toBe(estimateTokens(doc.slice(range), 3));
  });

  it('returns 0 for an empty range', () => {
    const estimator = createSizeEstimator(doc);
    expect(estimator.estimate({ start: 3, end: 2 })).toBe(0);
  });

  it('never decreases as the range grows', () => {
    const text = Array.from({ length: 50 }, (_, i) => 'x'.repeat(i % 7)).join('\n');
    const longDoc = new LineIndexedDocument(text + '\nend');
    const estimator = createSizeEstimator(longDoc);

    let previous = 0;
    for (let end = 1; end <= longDoc.lineCount; end++) {
      const current = estimator.estimate({ start: 1, end });
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });
});
