/**
 * Output Element Boundary Detector
 *
 * Finds the major literal result elements of a range: the shallowest
 * level of output elements that holds at least two siblings, looking
 * through a chain of single wrappers (the output root). Splitting between
 * sibling output blocks keeps each block whole.
 *
 * An element only counts when every element between it and the range
 * body is itself an output element; anything under an xsl: instruction
 * (for-each, choose, if) is conditional or repeated output and must not
 * be split from its instruction.
 */

import type { LineIndexedDocument } from '../document.js';
import { describeRange, tagLabel, type TagEvent } from '../scanner.js';
import type { DetectionResult, LineRange } from '../types.js';
import { addOpeningCandidate, emptyResult, isXslElement, nestingAmbiguities } from './shared.js';

export function detectOutputElementBoundaries(
  document: LineIndexedDocument,
  range: LineRange
): DetectionResult {
  const context = describeRange(document, range);
  const result = emptyResult();

  if (context.mismatches.length > 0) {
    result.ambiguities.push(...nestingAmbiguities('output_element', context));
    return result;
  }

  const { bodyDepth } = context;
  if (bodyDepth === undefined) {
    return result;
  }

  const literals = eligibleLiterals(context.events, bodyDepth);
  if (literals.length === 0) {
    return result;
  }

  const countByDepth = new Map<number, number>();
  for (const event of literals) {
    countByDepth.set(event.depth, (countByDepth.get(event.depth) ?? 0) + 1);
  }

  // Look through single wrappers
  let depth = literals.reduce((min, event) => Math.min(min, event.depth), Infinity);
  let lone: TagEvent | undefined;
  while (countByDepth.get(depth) === 1) {
    lone = literals.find((event) => event.depth === depth);
    depth++;
  }

  const majors = literals.filter((event) => event.depth === depth);
  if (majors.length === 0) {
    // The chain of single elements never branches
    if (lone) {
      result.ambiguities.push({
        detector: 'output_element',
        line: lone.line,
        reason: 'no sibling output element to split between',
      });
    }
    return result;
  }

  for (const event of majors) {
    addOpeningCandidate(result, 'output_element', range, event, 'output_element_open', tagLabel(event));
  }

  return result;
}

/**
 * Literal elements whose ancestors down to the body depth are literals too.
 */
function eligibleLiterals(events: TagEvent[], bodyDepth: number): TagEvent[] {
  const literals: TagEvent[] = [];
  const open: TagEvent[] = [];

  for (const event of events) {
    if (event.depth < bodyDepth) {
      continue;
    }

    // Drop elements this tag is not inside of
    while (open.length > 0 && (open[open.length - 1]?.depth ?? -1) >= event.depth) {
      open.pop();
    }

    if (event.type === 'close') {
      continue;
    }

    if (!isXslElement(event.name) && open.every((ancestor) => !isXslElement(ancestor.name))) {
      literals.push(event);
    }

    if (event.type === 'open') {
      open.push(event);
    }
  }

  return literals;
}
