/**
 * Overlap Calculator
 *
 * Decides how many trailing lines of one sub-chunk are repeated at the
 * head of the next, so a consumer reading the later chunk alone still
 * sees the declarations or open blocks just before it.
 *
 * The window is capped by the earlier chunk's own lines, loses leading
 * blank lines, and shrinks until the later chunk fits
 * maxTokens + toleranceTokens.
 */

import type { LineIndexedDocument } from './document.js';
import type { SizeEstimator } from './estimator.js';
import type { LineRange, OverlapPolicy } from './types.js';

export interface OverlapContext {
  document: LineIndexedDocument;
  estimator: SizeEstimator;
  policy: OverlapPolicy;
  maxTokens: number;
}

/**
 * Target overlap before any trimming.
 */
export function overlapTarget(previous: LineRange, policy: OverlapPolicy): number {
  if (policy.mode === 'proportional') {
    const lines = previous.end - previous.start + 1;
    return Math.min(policy.targetLines, Math.ceil(lines * policy.ratio));
  }
  return policy.targetLines;
}

/**
 * Overlap in lines for `current`, given the lines of the chunk before it
 * (both without overlap). `current` must start right after `previous`.
 */
export function computeOverlap(
  previous: LineRange,
  current: LineRange,
  context: OverlapContext
): number {
  const { document, estimator, policy, maxTokens } = context;
  const previousLines = previous.end - previous.start + 1;

  let overlap = Math.min(overlapTarget(previous, policy), previousLines);

  while (overlap > 0 && document.isBlank(current.start - overlap)) {
    overlap--;
  }

  const limit = maxTokens + policy.toleranceTokens;
  while (
    overlap > 0 &&
    estimator.estimate({ start: current.start - overlap, end: current.end }) > limit
  ) {
    overlap--;
  }

  return overlap;
}
