/**
 * Stylesheet builders for tests
 *
 * Every builder returns an array of lines so tests can compute line
 * numbers and lengths exactly. Nesting adds two spaces per level.
 */

import type { Chunk, LineRange } from '../chunker/types.js';

export const XSL_NAMESPACE = 'http://www.w3.org/1999/XSL/Transform';

/**
 * Join lines into document text (with a trailing newline)
 */
export function toText(lines: readonly string[]): string {
  return lines.join('\n') + '\n';
}

/**
 * Indent non-empty lines
 */
export function indent(lines: readonly string[], by = 2): string[] {
  const pad = ' '.repeat(by);
  return lines.map((line) => (line.length > 0 ? pad + line : line));
}

/**
 * XML declaration, stylesheet open, indented body, stylesheet close.
 * The body starts on line 3.
 */
export function stylesheet(body: readonly string[]): string[] {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<xsl:stylesheet version="2.0" xmlns:xsl="${XSL_NAMESPACE}">`,
    ...indent(body),
    '</xsl:stylesheet>',
  ];
}

/**
 * Template element; `attributes` is written as-is, e.g. `name="main"`
 */
export function template(attributes: string, body: readonly string[]): string[] {
  return [`<xsl:template ${attributes}>`, ...indent(body), '</xsl:template>'];
}

/**
 * Literal output element holding `fields` one-line children
 * (fields + 2 lines in total)
 */
export function outputBlock(name: string, fields: number): string[] {
  const children = Array.from({ length: fields }, (_, i) => {
    const field = `Field${i % 10}`;
    return `<${field}>value</${field}>`;
  });
  return [`<${name}>`, ...indent(children), `</${name}>`];
}

/**
 * `count` output blocks named Block00, Block01, ... of `linesPerBlock` lines
 */
export function outputBlocks(count: number, linesPerBlock: number): string[] {
  return Array.from({ length: count }, (_, i) =>
    outputBlock(`Block${String(i).padStart(2, '0')}`, linesPerBlock - 2)
  ).flat();
}

/**
 * Markup-free lines of exactly `width` characters
 */
export function textLines(count: number, width = 40): string[] {
  return Array.from({ length: count }, (_, i) =>
    `row ${String(i + 1).padStart(4, '0')} `.padEnd(width, 'x')
  );
}

/**
 * Lines each chunk owns, overlap removed
 */
export function coreRange(chunk: Chunk): LineRange {
  return { start: chunk.start_line + chunk.overlap_with_previous, end: chunk.end_line };
}

/**
 * Group chunks by parent unit, keeping emission order
 */
export function chunksByUnit(chunks: readonly Chunk[]): Map<string, Chunk[]> {
  const groups = new Map<string, Chunk[]>();
  for (const chunk of chunks) {
    const group = groups.get(chunk.parent_unit_id) ?? [];
    group.push(chunk);
    groups.set(chunk.parent_unit_id, group);
  }
  return groups;
}
