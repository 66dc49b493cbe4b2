/**
 * Markup Scanner
 *
 * A single lexical pass over the document buffer that yields the tag
 * events the boundary detectors work from. This is not a parser: it does
 * not validate, resolve namespaces or build a tree. It tracks element
 * nesting just far enough to tell how deep each tag sits and where the
 * nesting stops making sense.
 *
 * Comments, CDATA sections, processing instructions and DOCTYPE
 * declarations are skipped. Quoted attribute values may contain `>` and
 * may span lines.
 */

import type { LineIndexedDocument } from './document.js';
import type { LineRange } from './types.js';

export type TagType = 'open' | 'close' | 'self';

export interface TagEvent {
  type: TagType;
  /** Qualified name as written, e.g. `xsl:for-each` */
  name: string;
  /** Raw attribute text between the name and `>` */
  attributes: string;
  /** Line of the `<` */
  line: number;
  /** Line of the closing `>` */
  endLine: number;
  /**
   * Nesting depth: for open and self tags, the number of elements open
   * before the tag; for close tags, the depth of the matching open.
   */
  depth: number;
  /** Only whitespace precedes the tag on its line */
  leading: boolean;
  /** Only whitespace follows the tag on its last line */
  trailing: boolean;
  /** Open tags: last line of the matching close tag */
  closeLine?: number;
  /** Close tags: line of the matching open */
  openLine?: number;
}

export interface MarkupScan {
  /** Tag events in document order */
  events: TagEvent[];
  /** Lines holding a close tag that does not match the open element */
  mismatches: number[];
}

/**
 * Events and nesting facts for one line range.
 */
export interface RangeContext {
  events: TagEvent[];
  /**
   * Depth of the range's direct content. When a single element wraps the
   * range (a template, the stylesheet root), this is one below it.
   * Undefined for a range without tags.
   */
  bodyDepth?: number;
  /** Mismatch lines inside the range */
  mismatches: number[];
}

// Skipped constructs first, then tags: <, optional /, name, attributes, >
const TOKEN_PATTERN =
  /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<![A-Za-z][^>]*>|<(\/?)([A-Za-z_][\w.-]*(?::[A-Za-z_][\w.-]*)?)((?:[^>"']|"[^"]*"|'[^']*')*)>/g;

const scanCache = new WeakMap<LineIndexedDocument, MarkupScan>();

/**
 * Scan a document once; later calls return the cached result.
 */
export function scanMarkup(document: LineIndexedDocument): MarkupScan {
  const cached = scanCache.get(document);
  if (cached) {
    return cached;
  }

  const scan = runScan(document);
  scanCache.set(document, scan);
  return scan;
}

function runScan(document: LineIndexedDocument): MarkupScan {
  const { text } = document;
  const events: TagEvent[] = [];
  const mismatches: number[] = [];
  const stack: TagEvent[] = [];

  TOKEN_PATTERN.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = TOKEN_PATTERN.exec(text)) !== null) {
    const name = match[2];
    if (name === undefined) {
      continue; // comment, CDATA, PI or DOCTYPE
    }

    const isClose = match[1] === '/';
    const rawAttributes = match[3] ?? '';
    const isSelf = !isClose && rawAttributes.trimEnd().endsWith('/');

    const startOffset = match.index;
    const endOffset = startOffset + match[0].length;
    const line = document.lineAt(startOffset);
    const endLine = document.lineAt(endOffset - 1);

    const event: TagEvent = {
      type: isClose ? 'close' : isSelf ? 'self' : 'open',
      name,
      attributes: isSelf ? rawAttributes.trimEnd().slice(0, -1) : rawAttributes,
      line,
      endLine,
      depth: stack.length,
      leading: text.slice(document.lineStart(line), startOffset).trim() === '',
      trailing: text.slice(endOffset, document.lineEnd(endLine)).trim() === '',
    };

    if (event.type === 'open') {
      stack.push(event);
    } else if (event.type === 'close') {
      closeElement(stack, event, mismatches);
    }

    events.push(event);
  }

  return { events, mismatches };
}

/**
 * Pop the element a close tag ends and link the pair.
 * A close tag that skips over open elements, or matches nothing, is a
 * mismatch.
 */
function closeElement(stack: TagEvent[], close: TagEvent, mismatches: number[]): void {
  let index = stack.length - 1;
  while (index >= 0 && stack[index]?.name !== close.name) {
    index--;
  }

  if (index < 0) {
    mismatches.push(close.line);
    return;
  }

  if (index !== stack.length - 1) {
    mismatches.push(close.line);
  }

  const open = stack[index];
  stack.length = index;
  close.depth = index;
  if (open) {
    open.closeLine = close.endLine;
    close.openLine = open.line;
  }
}

/**
 * Events whose `<` lies inside the range, in document order.
 */
export function eventsInRange(scan: MarkupScan, range: LineRange): TagEvent[] {
  const first = lowerBound(scan.events, range.start);
  const result: TagEvent[] = [];
  for (let i = first; i < scan.events.length; i++) {
    const event = scan.events[i];
    if (!event || event.line > range.end) break;
    result.push(event);
  }
  return result;
}

function lowerBound(events: TagEvent[], line: number): number {
  let low = 0;
  let high = events.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if ((events[mid]?.line ?? Infinity) < line) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Collect the events, body depth and mismatches of a range.
 */
export function describeRange(document: LineIndexedDocument, range: LineRange): RangeContext {
  const scan = scanMarkup(document);
  const events = eventsInRange(scan, range);
  const mismatches = scan.mismatches.filter((line) => line >= range.start && line <= range.end);

  if (events.length === 0) {
    return { events, mismatches };
  }

  const minDepth = events.reduce((min, event) => Math.min(min, event.depth), Infinity);

  // Distinct elements at the shallowest depth: opens and self tags, plus
  // closes whose open lies before the range
  const elementsAtMin = events.filter(
    (event) =>
      event.depth === minDepth &&
      (event.type !== 'close' || event.openLine === undefined || event.openLine < range.start)
  ).length;

  return {
    events,
    bodyDepth: elementsAtMin === 1 ? minDepth + 1 : minDepth,
    mismatches,
  };
}

/**
 * Value of an attribute on a tag, if present.
 */
export function attributeValue(event: TagEvent, attribute: string): string | undefined {
  const pattern = new RegExp(`(?:^|\\s)${attribute}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`);
  const match = pattern.exec(event.attributes);
  if (!match) {
    return undefined;
  }
  return match[1] ?? match[2];
}

/**
 * Short single-line rendering of a tag for candidate labels.
 */
export function tagLabel(event: TagEvent, maxLength = 80): string {
  const attributes = event.attributes.replace(/\s+/g, ' ').trim();
  const prefix = event.type === 'close' ? '</' : '<';
  const suffix = event.type === 'self' ? '/>' : '>';
  const label = `${prefix}${event.name}${attributes ? ' ' + attributes : ''}${suffix}`;
  return label.length > maxLength ? `${label.slice(0, maxLength - 3)}...` : label;
}
