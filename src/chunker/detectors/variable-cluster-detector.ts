/**
 * Variable Cluster Detector
 *
 * Consecutive sibling xsl:variable / xsl:param declarations belong
 * together. Each run yields one candidate at its first declaration, so a
 * split can come before the cluster but never through it.
 */

import type { LineIndexedDocument } from '../document.js';
import { attributeValue, describeRange, type TagEvent } from '../scanner.js';
import type { DetectionResult, LineRange } from '../types.js';
import { addOpeningCandidate, bodySiblings, emptyResult, nestingAmbiguities } from './shared.js';

export const DECLARATION_ELEMENTS: ReadonlySet<string> = new Set(['xsl:variable', 'xsl:param']);

const MAX_LABEL_NAMES = 4;

export function detectVariableClusters(
  document: LineIndexedDocument,
  range: LineRange
): DetectionResult {
  const context = describeRange(document, range);
  const result = emptyResult();

  if (context.mismatches.length > 0) {
    result.ambiguities.push(...nestingAmbiguities('variable_cluster', context));
    return result;
  }

  for (const cluster of groupClusters(bodySiblings(context))) {
    const first = cluster[0];
    if (first) {
      addOpeningCandidate(result, 'variable_cluster', range, first, 'variable_cluster_start', clusterLabel(cluster));
    }
  }

  return result;
}

/**
 * Split siblings into maximal runs of declarations.
 */
function groupClusters(siblings: TagEvent[]): TagEvent[][] {
  const clusters: TagEvent[][] = [];
  let current: TagEvent[] = [];

  for (const event of siblings) {
    if (DECLARATION_ELEMENTS.has(event.name)) {
      current.push(event);
    } else if (current.length > 0) {
      clusters.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    clusters.push(current);
  }

  return clusters;
}

function clusterLabel(cluster: TagEvent[]): string {
  const names = cluster.map((event) => attributeValue(event, 'name') ?? '?');
  const shown = names.slice(0, MAX_LABEL_NAMES).join(', ');
  const more = names.length > MAX_LABEL_NAMES ? ` (+${names.length - MAX_LABEL_NAMES} more)` : '';
  return `variables: ${shown}${more}`;
}
