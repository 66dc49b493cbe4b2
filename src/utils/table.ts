/**
 * Table Formatting Utility
 *
 * Box-drawn tables for CLI output (chunk listings, boundary reports).
 * Columns can be capped in width; long cells are cut with an ellipsis.
 * An optional footer row sits below its own separator, for totals.
 */

import chalk from 'chalk';

/**
 * Column alignment options
 */
export type Alignment = 'left' | 'right' | 'center';

/**
 * Column definition for table
 */
export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Minimum width */
  minWidth?: number;
  /** Maximum width; longer cells are truncated with '…' */
  maxWidth?: number;
}

/**
 * Table row data - key-value pairs
 */
export type Row = Record<string, string | number | boolean | null | undefined>;

export interface TableOptions {
  /** Row rendered after a separator at the bottom (e.g. totals) */
  footer?: Row;
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeDown: '┬',
  teeUp: '┴',
  teeRight: '├',
  teeLeft: '┤',
  cross: '┼',
} as const;

/**
 * Strip ANSI escape codes from string (for length calculation)
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

/**
 * Visible width of a cell
 */
function visibleLength(str: string): number {
  return stripAnsi(str).length;
}

function cellText(row: Row, column: Column): string {
  const value = row[column.key];
  return value != null ? String(value) : '';
}

/**
 * Cut a cell down to width. Coloured cells lose their colour when cut.
 */
function truncate(str: string, width: number): string {
  if (visibleLength(str) <= width) return str;
  const plain = stripAnsi(str);
  return width <= 1 ? plain.slice(0, width) : `${plain.slice(0, width - 1)}…`;
}

/**
 * Pad a string to a given width with specified alignment
 */
function pad(str: string, width: number, align: Alignment = 'left'): string {
  const padding = width - visibleLength(str);
  if (padding <= 0) return str;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + str;
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + str + ' '.repeat(padding - left);
    }
    case 'left':
    default:
      return str + ' '.repeat(padding);
  }
}

/**
 * Width of each column: widest of header and cells, clamped to min/max
 */
function columnWidths(columns: Column[], rows: Row[]): number[] {
  return columns.map((column) => {
    const widest = rows.reduce(
      (max, row) => Math.max(max, visibleLength(cellText(row, column))),
      column.header.length
    );
    const atLeast = Math.max(widest, column.minWidth ?? 0);
    return column.maxWidth !== undefined ? Math.min(atLeast, column.maxWidth) : atLeast;
  });
}

/**
 * Format data as a box-drawn table
 *
 * @example
 * ```ts
 * const columns: Column[] = [
 *   { header: 'Chunk', key: 'id' },
 *   { header: 'Tokens', key: 'tokens', align: 'right' },
 * ];
 * const rows = [
 *   { id: 'chunk_000', tokens: 1200 },
 *   { id: 'chunk_001', tokens: 950 },
 * ];
 * console.log(formatTable(columns, rows, { footer: { id: 'total', tokens: 2150 } }));
 * ```
 *
 * Output:
 * ```
 * ┌───────────┬────────┐
 * │ Chunk     │ Tokens │
 * ├───────────┼────────┤
 * │ chunk_000 │   1200 │
 * │ chunk_001 │    950 │
 * ├───────────┼────────┤
 * │ total     │   2150 │
 * └───────────┴────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[], options: TableOptions = {}): string {
  if (columns.length === 0) return '';

  const { footer } = options;
  const widths = columnWidths(columns, footer ? [...rows, footer] : rows);

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((width) => BOX.horizontal.repeat(width + 2)).join(middle) + right;

  const line = (cells: string[], style?: (text: string) => string): string => {
    const rendered = columns.map((column, i) => {
      const width = widths[i] ?? 0;
      const text = pad(truncate(cells[i] ?? '', width), width, column.align ?? 'left');
      return style ? style(text) : text;
    });
    return BOX.vertical + rendered.map((cell) => ` ${cell} `).join(BOX.vertical) + BOX.vertical;
  };

  const lines = [
    rule(BOX.topLeft, BOX.teeDown, BOX.topRight),
    line(columns.map((column) => column.header), chalk.bold),
    rule(BOX.teeRight, BOX.cross, BOX.teeLeft),
    ...rows.map((row) => line(columns.map((column) => cellText(row, column)))),
  ];

  if (footer) {
    lines.push(rule(BOX.teeRight, BOX.cross, BOX.teeLeft));
    lines.push(line(columns.map((column) => cellText(footer, column)), chalk.bold));
  }

  lines.push(rule(BOX.bottomLeft, BOX.teeUp, BOX.bottomRight));
  return lines.join('\n');
}
