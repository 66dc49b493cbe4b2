/**
 * Boundary Detectors
 *
 * Independent lexical scanners, one per boundary class. Each is a pure
 * function of (document, range); a streaming parser could replace any of
 * them without touching the splitter or the assembler.
 */

import type { LineIndexedDocument } from '../document.js';
import type { DetectionResult, DetectorName, LineRange } from '../types.js';
import { detectConditionalBlocks } from './conditional-detector.js';
import { detectOutputElementBoundaries } from './output-element-detector.js';
import { detectRepetitionBoundaries } from './repetition-detector.js';
import { detectUnitBoundaries } from './unit-detector.js';
import { detectVariableClusters } from './variable-cluster-detector.js';

export type BoundaryDetector = (document: LineIndexedDocument, range: LineRange) => DetectionResult;

export const DEFAULT_DETECTORS: Record<DetectorName, BoundaryDetector> = {
  unit: detectUnitBoundaries,
  output_element: detectOutputElementBoundaries,
  repetition: detectRepetitionBoundaries,
  variable_cluster: detectVariableClusters,
  conditional: detectConditionalBlocks,
};

/**
 * Run the named detectors over a range, in the order given.
 */
export function runDetectors(
  document: LineIndexedDocument,
  range: LineRange,
  names: readonly DetectorName[]
): DetectionResult[] {
  return names.map((name) => DEFAULT_DETECTORS[name](document, range));
}

export { detectUnitBoundaries, isUnitElement, unitName, UNIT_ELEMENTS } from './unit-detector.js';
export { detectOutputElementBoundaries } from './output-element-detector.js';
export { detectRepetitionBoundaries, REPETITION_ELEMENTS } from './repetition-detector.js';
export { detectVariableClusters, DECLARATION_ELEMENTS } from './variable-cluster-detector.js';
export { detectConditionalBlocks, CONDITIONAL_ELEMENTS } from './conditional-detector.js';
