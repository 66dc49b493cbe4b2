/**
 * Unit Boundary Detector
 *
 * Template and function elements are the largest constructs the engine
 * reasons about. A split may fall before a unit's open tag or after its
 * close tag, never inside it.
 */

import type { LineIndexedDocument } from '../document.js';
import { attributeValue, describeRange, type TagEvent } from '../scanner.js';
import type { DetectionResult, LineRange } from '../types.js';
import { addOpeningCandidate, createCandidate, emptyResult, nestingAmbiguities } from './shared.js';

export const UNIT_ELEMENTS: ReadonlySet<string> = new Set(['xsl:template', 'xsl:function']);

export function isUnitElement(event: TagEvent): boolean {
  return UNIT_ELEMENTS.has(event.name);
}

/**
 * Name of a unit: `name="…"`, else `match:<pattern>`.
 */
export function unitName(event: TagEvent): string | undefined {
  const name = attributeValue(event, 'name');
  if (name !== undefined) {
    return name;
  }
  const match = attributeValue(event, 'match');
  return match !== undefined ? `match:${match}` : undefined;
}

export function detectUnitBoundaries(
  document: LineIndexedDocument,
  range: LineRange
): DetectionResult {
  const context = describeRange(document, range);
  const result = emptyResult();

  if (context.mismatches.length > 0) {
    result.ambiguities.push(...nestingAmbiguities('unit', context));
    return result;
  }

  const units = context.events.filter(isUnitElement);
  if (units.length === 0) {
    return result;
  }

  // Units nested in other units are not valid split points
  const unitDepth = units.reduce((min, event) => Math.min(min, event.depth), Infinity);

  for (const event of units) {
    if (event.depth !== unitDepth) {
      continue;
    }

    const name = unitName(event) ?? event.name;

    if (event.type === 'open' || event.type === 'self') {
      addOpeningCandidate(result, 'unit', range, event, 'unit_start', `${event.name} ${name}`);
    }

    if (event.type === 'close' || event.type === 'self') {
      if (event.endLine >= range.end) {
        continue;
      }
      if (!event.trailing) {
        result.ambiguities.push({
          detector: 'unit',
          line: event.endLine,
          reason: 'unit close is followed by markup on the same line',
        });
        continue;
      }
      const label = event.type === 'close' ? `</${event.name}>` : `${event.name} ${name}`;
      result.candidates.push(createCandidate('unit_end', event.endLine, label));
    }
  }

  return result;
}
