/**
 * Top-level unit discovery
 *
 * Walks the whole document and cuts it into the units the assembler
 * chunks one by one: templates and functions at the document's unit
 * depth, and the top-level stretches between them. The units cover every
 * line exactly once, in document order.
 */

import type { LineIndexedDocument } from './document.js';
import { isUnitElement, unitName } from './detectors/index.js';
import { scanMarkup, type TagEvent } from './scanner.js';
import type { LineRange, TopLevelUnit, UnitType } from './types.js';

interface UnitDraft {
  type: UnitType;
  name?: string;
  range: LineRange;
}

export function findTopLevelUnits(
  document: LineIndexedDocument,
  helperPatterns: readonly string[] = []
): TopLevelUnit[] {
  const helpers = helperPatterns.map((source) => new RegExp(source));
  const elements = mergeTouching(findUnitElements(document, helpers));

  const drafts: UnitDraft[] = [];
  let pendingBlank: LineRange | undefined;
  let cursor = 1;

  const addGap = (gap: LineRange): void => {
    if (!isBlankRange(document, gap)) {
      drafts.push({ type: 'top_level', range: gap });
      return;
    }
    const last = drafts[drafts.length - 1];
    if (last) {
      last.range = { start: last.range.start, end: gap.end };
    } else {
      pendingBlank = gap;
    }
  };

  for (const element of elements) {
    if (element.range.start > cursor) {
      addGap({ start: cursor, end: element.range.start - 1 });
    }
    if (pendingBlank) {
      element.range = { start: pendingBlank.start, end: element.range.end };
      pendingBlank = undefined;
    }
    drafts.push(element);
    cursor = element.range.end + 1;
  }

  if (cursor <= document.lineCount) {
    addGap({ start: cursor, end: document.lineCount });
  }

  return drafts.map((draft, index) => ({
    id: `unit_${String(index).padStart(3, '0')}`,
    ...draft,
  }));
}

/**
 * The whole document as a single unit, for documents that fit the budget.
 */
export function documentUnit(document: LineIndexedDocument): TopLevelUnit {
  return { id: 'unit_000', type: 'document', range: document.fullRange };
}

/**
 * Template and function elements at the shallowest unit depth, with a
 * known end. Units that never close are left to the top-level stretches.
 */
function findUnitElements(document: LineIndexedDocument, helpers: RegExp[]): UnitDraft[] {
  const opens = scanMarkup(document).events.filter(
    (event) => isUnitElement(event) && event.type !== 'close'
  );
  if (opens.length === 0) {
    return [];
  }

  const unitDepth = opens.reduce((min, event) => Math.min(min, event.depth), Infinity);
  const drafts: UnitDraft[] = [];

  for (const event of opens) {
    if (event.depth !== unitDepth) continue;

    const end = event.type === 'self' ? event.endLine : event.closeLine;
    if (end === undefined) continue;

    const name = unitName(event);
    drafts.push({
      type: classifyUnit(event, name, helpers),
      name,
      range: { start: event.line, end },
    });
  }

  return drafts;
}

function classifyUnit(event: TagEvent, name: string | undefined, helpers: RegExp[]): UnitType {
  if (event.name === 'xsl:function') {
    return 'function';
  }
  if (name !== undefined && helpers.some((pattern) => pattern.test(name))) {
    return 'helper_template';
  }
  return 'main_template';
}

/**
 * Units sharing a line cannot be separated by line splits; fold them
 * into the first.
 */
function mergeTouching(drafts: UnitDraft[]): UnitDraft[] {
  const merged: UnitDraft[] = [];
  for (const draft of drafts) {
    const last = merged[merged.length - 1];
    if (last && draft.range.start <= last.range.end) {
      last.range = { start: last.range.start, end: Math.max(last.range.end, draft.range.end) };
    } else {
      merged.push({ ...draft });
    }
  }
  return merged;
}

function isBlankRange(document: LineIndexedDocument, range: LineRange): boolean {
  for (let line = range.start; line <= range.end; line++) {
    if (!document.isBlank(line)) return false;
  }
  return true;
}
