/**
 * Boundary Aggregator
 *
 * Merges the candidate lists of all detectors into one ascending,
 * deduplicated list keyed by split line:
 * - several kinds at one split line: the higher priority wins
 * - the same kind at the same or the next split line: the first is kept
 */

import { BOUNDARY_PRIORITY } from './config.js';
import type { BoundaryCandidate, BoundaryKind, DetectionResult, LineRange } from './types.js';

/**
 * First line of the segment a candidate opens.
 */
export function splitLineOf(candidate: BoundaryCandidate): number {
  return candidate.kind === 'unit_end' ? candidate.line + 1 : candidate.line;
}

export interface AggregateOptions {
  /** Only keep candidates whose split line falls strictly inside the range */
  range?: LineRange;
  priorities?: Partial<Record<BoundaryKind, number>>;
}

export function aggregateBoundaries(
  lists: ReadonlyArray<readonly BoundaryCandidate[]>,
  options: AggregateOptions = {}
): BoundaryCandidate[] {
  const { range } = options;
  const priorities = { ...BOUNDARY_PRIORITY, ...options.priorities };

  const all = lists
    .flat()
    .map((candidate) => ({ ...candidate, priority: priorities[candidate.kind] }))
    .filter((candidate) => {
      if (!range) return true;
      const splitLine = splitLineOf(candidate);
      return splitLine > range.start && splitLine <= range.end;
    });

  // Ascending split line; within a line, highest priority first, then kind
  // name so the order never depends on detector order
  all.sort(
    (a, b) =>
      splitLineOf(a) - splitLineOf(b) ||
      b.priority - a.priority ||
      a.kind.localeCompare(b.kind)
  );

  const result: BoundaryCandidate[] = [];
  for (const candidate of all) {
    const previous = result[result.length - 1];
    if (previous) {
      const gap = splitLineOf(candidate) - splitLineOf(previous);
      if (gap === 0) {
        continue;
      }
      if (gap === 1 && previous.kind === candidate.kind) {
        continue;
      }
    }
    result.push(candidate);
  }

  return result;
}

/**
 * Aggregate the candidates of several detector results.
 */
export function aggregateResults(
  results: readonly DetectionResult[],
  options: AggregateOptions = {}
): BoundaryCandidate[] {
  return aggregateBoundaries(
    results.map((result) => result.candidates),
    options
  );
}
