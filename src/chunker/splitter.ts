/**
 * Chunk Splitter
 *
 * Partitions an oversized line range into segments that fit the token
 * budget, splitting on boundary candidates wherever it can.
 *
 * Greedy forward scan:
 * 1. From the current line, find the furthest end that still fits
 *    maxTokens (binary search, the estimator is monotonic).
 * 2. Back up to the nearest candidate split line inside that window. Use
 *    it if the segment before it holds at least minTokens.
 * 3. Otherwise hard-split at the furthest fitting end.
 * 4. A line that alone exceeds maxTokens becomes its own segment.
 *
 * The partition is canonical for a given document, candidate list and
 * budget.
 */

import { splitLineOf } from './aggregator.js';
import type { SizeEstimator } from './estimator.js';
import type {
  BoundaryCandidate,
  LineRange,
  SizeBudget,
  SplitReason,
  SplitSegment,
} from './types.js';

export function splitRange(
  range: LineRange,
  boundaries: readonly BoundaryCandidate[],
  estimator: SizeEstimator,
  budget: SizeBudget
): SplitSegment[] {
  const candidateAt = new Map<number, BoundaryCandidate>();
  for (const candidate of boundaries) {
    const splitLine = splitLineOf(candidate);
    if (splitLine > range.start && splitLine <= range.end && !candidateAt.has(splitLine)) {
      candidateAt.set(splitLine, candidate);
    }
  }
  const splitLines = [...candidateAt.keys()].sort((a, b) => a - b);

  const ranges: Array<{ range: LineRange; oversized: boolean }> = [];
  let position = range.start;

  while (position <= range.end) {
    const rest = { start: position, end: range.end };
    if (estimator.estimate(rest) <= budget.maxTokens) {
      ranges.push({ range: rest, oversized: false });
      break;
    }

    const fitEnd = furthestFittingEnd(position, range.end, estimator, budget.maxTokens);

    if (fitEnd < position) {
      ranges.push({ range: { start: position, end: position }, oversized: true });
      position++;
      continue;
    }

    const splitLine = lastSplitLineIn(splitLines, position + 1, fitEnd + 1);
    if (
      splitLine !== undefined &&
      estimator.estimate({ start: position, end: splitLine - 1 }) >= budget.minTokens
    ) {
      ranges.push({ range: { start: position, end: splitLine - 1 }, oversized: false });
      position = splitLine;
    } else {
      ranges.push({ range: { start: position, end: fitEnd }, oversized: false });
      position = fitEnd + 1;
    }
  }

  return ranges.map(({ range: segment, oversized }, index) => {
    const startsAt: SplitReason = index === 0 ? 'range_edge' : reasonAt(candidateAt, segment.start);
    const endsAt: SplitReason =
      index === ranges.length - 1 ? 'range_edge' : reasonAt(candidateAt, segment.end + 1);

    return {
      range: segment,
      tokens: estimator.estimate(segment),
      startsAt,
      endsAt,
      boundary: startsAt === 'boundary' ? candidateAt.get(segment.start) : undefined,
      isBudgetExceeded: oversized,
    };
  });
}

function reasonAt(candidateAt: Map<number, BoundaryCandidate>, splitLine: number): SplitReason {
  return candidateAt.has(splitLine) ? 'boundary' : 'fallback';
}

/**
 * Largest end in [start, limit] whose range fits, or start - 1 when even
 * the first line does not.
 */
function furthestFittingEnd(
  start: number,
  limit: number,
  estimator: SizeEstimator,
  maxTokens: number
): number {
  let low = start - 1;
  let high = limit;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (estimator.estimate({ start, end: mid }) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

/**
 * Largest split line in [from, to], if any.
 */
function lastSplitLineIn(splitLines: readonly number[], from: number, to: number): number | undefined {
  let low = 0;
  let high = splitLines.length;
  // First index with splitLine > to
  while (low < high) {
    const mid = (low + high) >> 1;
    if ((splitLines[mid] ?? Infinity) <= to) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  const candidate = splitLines[low - 1];
  return candidate !== undefined && candidate >= from ? candidate : undefined;
}
