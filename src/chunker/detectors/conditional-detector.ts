/**
 * Conditional Block Boundary Detector
 *
 * Outermost xsl:choose / xsl:if blocks of a range. Branches nested inside
 * another block sit deeper than the body depth and are never reported.
 */

import type { LineIndexedDocument } from '../document.js';
import { describeRange, tagLabel } from '../scanner.js';
import type { DetectionResult, LineRange } from '../types.js';
import { addOpeningCandidate, bodySiblings, emptyResult, nestingAmbiguities } from './shared.js';

export const CONDITIONAL_ELEMENTS: ReadonlySet<string> = new Set(['xsl:choose', 'xsl:if']);

export function detectConditionalBlocks(
  document: LineIndexedDocument,
  range: LineRange
): DetectionResult {
  const context = describeRange(document, range);
  const result = emptyResult();

  if (context.mismatches.length > 0) {
    result.ambiguities.push(...nestingAmbiguities('conditional', context));
    return result;
  }

  for (const event of bodySiblings(context)) {
    if (event.type === 'open' && CONDITIONAL_ELEMENTS.has(event.name)) {
      addOpeningCandidate(result, 'conditional', range, event, 'conditional_block_start', tagLabel(event));
    }
  }

  return result;
}
