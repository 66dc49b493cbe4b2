/**
 * Repetition Boundary Detector
 *
 * Iteration instructions at the body depth of a range. Loops nested in
 * other instructions or output elements are left alone.
 */

import type { LineIndexedDocument } from '../document.js';
import { describeRange, tagLabel } from '../scanner.js';
import type { DetectionResult, LineRange } from '../types.js';
import { addOpeningCandidate, bodySiblings, emptyResult, nestingAmbiguities } from './shared.js';

export const REPETITION_ELEMENTS: ReadonlySet<string> = new Set([
  'xsl:for-each',
  'xsl:for-each-group',
  'xsl:iterate',
]);

export function detectRepetitionBoundaries(
  document: LineIndexedDocument,
  range: LineRange
): DetectionResult {
  const context = describeRange(document, range);
  const result = emptyResult();

  if (context.mismatches.length > 0) {
    result.ambiguities.push(...nestingAmbiguities('repetition', context));
    return result;
  }

  for (const event of bodySiblings(context)) {
    if (event.type === 'open' && REPETITION_ELEMENTS.has(event.name)) {
      addOpeningCandidate(result, 'repetition', range, event, 'repetition_start', tagLabel(event));
    }
  }

  return result;
}
