/**
 * Helpers shared by the boundary detectors.
 */

import { BOUNDARY_PRIORITY } from '../config.js';
import type { RangeContext, TagEvent } from '../scanner.js';
import type {
  BoundaryAmbiguity,
  BoundaryCandidate,
  BoundaryKind,
  DetectionResult,
  DetectorName,
  LineRange,
} from '../types.js';

export const XSL_PREFIX = 'xsl:';

export function isXslElement(name: string): boolean {
  return name.startsWith(XSL_PREFIX);
}

export function createCandidate(kind: BoundaryKind, line: number, label: string): BoundaryCandidate {
  return { line, kind, priority: BOUNDARY_PRIORITY[kind], label };
}

export function emptyResult(): DetectionResult {
  return { candidates: [], ambiguities: [] };
}

/**
 * Depth-based detectors give up on a range whose nesting is broken.
 */
export function nestingAmbiguities(
  detector: DetectorName,
  context: RangeContext
): BoundaryAmbiguity[] {
  return context.mismatches.map((line) => ({
    detector,
    line,
    reason: 'mismatched close tag, nesting unknown',
  }));
}

/**
 * Add a candidate for a tag that opens a new segment, or record why not.
 * Tags on the range's first line are skipped silently: splitting there
 * would produce an empty segment.
 */
export function addOpeningCandidate(
  result: DetectionResult,
  detector: DetectorName,
  range: LineRange,
  event: TagEvent,
  kind: BoundaryKind,
  label: string
): void {
  if (event.line <= range.start) {
    return;
  }

  if (!event.leading) {
    result.ambiguities.push({
      detector,
      line: event.line,
      reason: 'tag shares its line with earlier markup',
    });
    return;
  }

  result.candidates.push(createCandidate(kind, event.line, label));
}

/**
 * Open and self-closing tags sitting directly at the range's body depth.
 */
export function bodySiblings(context: RangeContext): TagEvent[] {
  const { bodyDepth } = context;
  if (bodyDepth === undefined) {
    return [];
  }
  return context.events.filter(
    (event) => event.depth === bodyDepth && event.type !== 'close'
  );
}
