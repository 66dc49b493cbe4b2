/**
 * Tests for overlap between adjacent sub-chunks
 */

import { describe, it, expect } from 'vitest';
import { LineIndexedDocument } from '../document.js';
import { createSizeEstimator } from '../estimator.js';
import { computeOverlap, overlapTarget, type OverlapContext } from '../overlap.js';
import type { OverlapPolicy } from '../types.js';

const FIXED: OverlapPolicy = { targetLines: 5, mode: 'fixed', ratio: 0.05, toleranceTokens: 0 };

// Twenty lines of nine characters: a range of n lines holds 10n - 1 characters
function nineCharDocument(blankLines: number[] = []): LineIndexedDocument {
  const lines = Array.from({ length: 20 }, (_, i) =>
    blankLines.includes(i + 1) ? '' : `line-${String(i + 1).padStart(4, '0')}`
  );
  return new LineIndexedDocument(lines.join('\n'));
}

function context(
  document: LineIndexedDocument,
  maxTokens: number,
  policy: OverlapPolicy = FIXED
): OverlapContext {
  return { document, estimator: createSizeEstimator(document, 1), policy, maxTokens };
}

describe('overlapTarget', () => {
  it('uses the fixed line count', () => {
    expect(overlapTarget({ start: 1, end: 40 }, FIXED)).toBe(5);
  });

  it('takes a share of the previous chunk in proportional mode', () => {
    const policy: OverlapPolicy = { ...FIXED, mode: 'proportional', targetLines: 10, ratio: 0.25 };
    expect(overlapTarget({ start: 1, end: 20 }, policy)).toBe(5);
  });

  it('rounds proportional overlap up', () => {
    const policy: OverlapPolicy = { ...FIXED, mode: 'proportional' };
    expect(overlapTarget({ start: 1, end: 30 }, policy)).toBe(2);
  });

  it('never exceeds the target line count', () => {
    const policy: OverlapPolicy = { ...FIXED, mode: 'proportional', targetLines: 10, ratio: 0.5 };
    expect(overlapTarget({ start: 1, end: 40 }, policy)).toBe(10);
  });
});

describe('computeOverlap', () => {
  const previous = { start: 1, end: 10 };
  const current = { start: 11, end: 20 };

  it('uses the full target when the budget allows', () => {
    const document = nineCharDocument();
    expect(computeOverlap(previous, current, context(document, 1000))).toBe(5);
  });

  it('shrinks until the chunk fits the budget', () => {
    // current alone: 99 tokens; each overlap line adds 10
    const document = nineCharDocument();
    expect(computeOverlap(previous, current, context(document, 120))).toBe(2);
  });

  it('lets the overlap use the tolerance', () => {
    const document = nineCharDocument();
    const policy = { ...FIXED, toleranceTokens: 10 };
    expect(computeOverlap(previous, current, context(document, 120, policy))).toBe(3);
  });

  it('is zero when the chunk is already at the budget', () => {
    const document = nineCharDocument();
    expect(computeOverlap(previous, current, context(document, 99))).toBe(0);
  });

  it('is capped by the previous chunk length', () => {
    const document = nineCharDocument();
    expect(computeOverlap({ start: 9, end: 10 }, current, context(document, 1000))).toBe(2);
  });

  it('drops blank lines at the start of the window', () => {
    const document = nineCharDocument([6, 7]);
    expect(computeOverlap(previous, current, context(document, 1000))).toBe(3);
  });

  it('is zero when the target is zero', () => {
    const document = nineCharDocument();
    const policy = { ...FIXED, targetLines: 0 };
    expect(computeOverlap(previous, current, context(document, 1000, policy))).toBe(0);
  });
});
