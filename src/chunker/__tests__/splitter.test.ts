/**
 * Tests for the greedy range splitter
 */

import { describe, it, expect } from 'vitest';
import { createCandidate } from '../detectors/shared.js';
import type { SizeEstimator } from '../estimator.js';
import { splitRange } from '../splitter.js';
import type { LineRange } from '../types.js';

/**
 * Estimator where line n costs costs[n - 1] tokens.
 */
function costEstimator(costs: number[]): SizeEstimator {
  return {
    estimate(range: LineRange): number {
      let total = 0;
      for (let line = range.start; line <= range.end; line++) {
        total += costs[line - 1] ?? 0;
      }
      return total;
    },
  };
}

const TEN_LINES = { start: 1, end: 10 };
const FLAT = costEstimator(Array.from({ length: 10 }, () => 10));

function ranges(segments: Array<{ range: LineRange }>): string[] {
  return segments.map(({ range }) => `${range.start}-${range.end}`);
}

describe('splitRange', () => {
  it('returns one segment when the range fits', () => {
    const segments = splitRange(TEN_LINES, [], FLAT, { maxTokens: 100, minTokens: 0 });

    expect(segments).toEqual([
      {
        range: TEN_LINES,
        tokens: 100,
        startsAt: 'range_edge',
        endsAt: 'range_edge',
        boundary: undefined,
        isBudgetExceeded: false,
      },
    ]);
  });

  it('hard-splits at the furthest fitting line without candidates', () => {
    const segments = splitRange(TEN_LINES, [], FLAT, { maxTokens: 35, minTokens: 0 });

    expect(ranges(segments)).toEqual(['1-3', '4-6', '7-9', '10-10']);
    expect(segments.map((s) => [s.startsAt, s.endsAt])).toEqual([
      ['range_edge', 'fallback'],
      ['fallback', 'fallback'],
      ['fallback', 'fallback'],
      ['fallback', 'range_edge'],
    ]);
    expect(segments.map((s) => s.tokens)).toEqual([30, 30, 30, 10]);
  });

  it('backs up to the nearest candidate inside the window', () => {
    const first = createCandidate('output_element_open', 3, '<A>');
    const second = createCandidate('output_element_open', 6, '<B>');

    const segments = splitRange(TEN_LINES, [first, second], FLAT, { maxTokens: 45, minTokens: 15 });

    expect(ranges(segments)).toEqual(['1-2', '3-5', '6-9', '10-10']);
    expect(segments.map((s) => [s.startsAt, s.endsAt])).toEqual([
      ['range_edge', 'boundary'],
      ['boundary', 'boundary'],
      ['boundary', 'fallback'],
      ['fallback', 'range_edge'],
    ]);
    expect(segments[1]?.boundary).toEqual(first);
    expect(segments[2]?.boundary).toEqual(second);
    expect(segments[3]?.boundary).toBeUndefined();
  });

  it('ignores a candidate that would leave a segment under the minimum', () => {
    const early = createCandidate('repetition_start', 2, '<xsl:for-each>');

    const segments = splitRange(TEN_LINES, [early], FLAT, { maxTokens: 45, minTokens: 15 });

    expect(ranges(segments)).toEqual(['1-4', '5-8', '9-10']);
    expect(segments.every((s) => s.startsAt !== 'boundary')).toBe(true);
  });

  it('splits after a unit end', () => {
    const end = createCandidate('unit_end', 4, '</xsl:template>');

    const segments = splitRange(TEN_LINES, [end], FLAT, { maxTokens: 60, minTokens: 0 });

    expect(ranges(segments)).toEqual(['1-4', '5-10']);
    expect(segments[1]?.boundary).toEqual(end);
  });

  it('ignores candidates outside the range', () => {
    const outside = createCandidate('output_element_open', 12, '<Late>');
    const atStart = createCandidate('output_element_open', 1, '<Early>');

    const segments = splitRange(TEN_LINES, [outside, atStart], FLAT, { maxTokens: 35, minTokens: 0 });

    expect(ranges(segments)).toEqual(['1-3', '4-6', '7-9', '10-10']);
  });

  it('isolates a line that alone exceeds the budget', () => {
    const segments = splitRange({ start: 1, end: 3 }, [], costEstimator([10, 100, 10]), {
      maxTokens: 50,
      minTokens: 0,
    });

    expect(ranges(segments)).toEqual(['1-1', '2-2', '3-3']);
    expect(segments.map((s) => s.tokens)).toEqual([10, 100, 10]);
    expect(segments.map((s) => s.isBudgetExceeded)).toEqual([false, true, false]);
  });

  it('partitions the range without gaps or overlap', () => {
    const candidates = [3, 5, 8].map((line) => createCandidate('conditional_block_start', line, 'if'));
    const segments = splitRange(TEN_LINES, candidates, FLAT, { maxTokens: 25, minTokens: 10 });

    let next = TEN_LINES.start;
    for (const segment of segments) {
      expect(segment.range.start).toBe(next);
      expect(segment.tokens).toBeLessThanOrEqual(25);
      next = segment.range.end + 1;
    }
    expect(next).toBe(TEN_LINES.end + 1);
  });

  it('returns the same partition on every call', () => {
    const candidates = [createCandidate('output_element_open', 4, '<A>')];
    const budget = { maxTokens: 45, minTokens: 15 };

    expect(splitRange(TEN_LINES, candidates, FLAT, budget)).toEqual(
      splitRange(TEN_LINES, candidates, FLAT, budget)
    );
  });
});
