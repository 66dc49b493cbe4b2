/**
 * Line-indexed document
 *
 * Wraps the raw stylesheet text as one immutable buffer plus per-line
 * offsets. Every other component addresses the document by 1-indexed
 * line numbers; text is only copied when a caller asks for it.
 */

import { DocumentError } from '../errors/index.js';
import type { LineRange } from './types.js';

export class LineIndexedDocument {
  /** Identifier of the input (file path or label) */
  readonly source: string;

  /** The raw text, unmodified */
  readonly text: string;

  /** Offset of each line's first character */
  private readonly starts: number[] = [];

  /** Offset just past each line's last character, terminator excluded */
  private readonly ends: number[] = [];

  /**
   * @throws DocumentError if the text is empty or whitespace only
   */
  constructor(text: string, source: string = '<memory>') {
    if (text.trim().length === 0) {
      throw new DocumentError(`Document is empty: ${source}`, source);
    }

    this.source = source;
    this.text = text;

    let start = 0;
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.pushLine(start, i);
        start = i + 1;
      }
    }
    // A trailing newline does not open another line
    if (start < text.length) {
      this.pushLine(start, text.length);
    }
  }

  private pushLine(start: number, end: number): void {
    const trimmedEnd = end > start && this.text.charCodeAt(end - 1) === 13 ? end - 1 : end;
    this.starts.push(start);
    this.ends.push(trimmedEnd);
  }

  /** Total number of lines */
  get lineCount(): number {
    return this.starts.length;
  }

  /** The full document as a range */
  get fullRange(): LineRange {
    return { start: 1, end: this.lineCount };
  }

  /**
   * Text of one line, without its terminator.
   */
  line(lineNumber: number): string {
    this.assertLine(lineNumber);
    return this.text.slice(this.starts[lineNumber - 1], this.ends[lineNumber - 1]);
  }

  /**
   * Contiguous text of a line range, inner line terminators preserved.
   */
  slice(range: LineRange): string {
    this.assertRange(range);
    return this.text.slice(this.starts[range.start - 1], this.ends[range.end - 1]);
  }

  /**
   * Character count of slice(range), computed from offsets.
   */
  charCount(range: LineRange): number {
    this.assertRange(range);
    return (this.ends[range.end - 1] ?? 0) - (this.starts[range.start - 1] ?? 0);
  }

  /** Offset of a line's first character */
  lineStart(lineNumber: number): number {
    this.assertLine(lineNumber);
    return this.starts[lineNumber - 1] ?? 0;
  }

  /** Offset just past a line's last character */
  lineEnd(lineNumber: number): number {
    this.assertLine(lineNumber);
    return this.ends[lineNumber - 1] ?? 0;
  }

  /**
   * Line containing a buffer offset (binary search over line starts).
   */
  lineAt(offset: number): number {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  /** Whether a line holds only whitespace */
  isBlank(lineNumber: number): boolean {
    return this.line(lineNumber).trim().length === 0;
  }

  /** Whether a range lies within the document */
  contains(range: LineRange): boolean {
    return (
      Number.isInteger(range.start) &&
      Number.isInteger(range.end) &&
      range.start >= 1 &&
      range.start <= range.end &&
      range.end <= this.lineCount
    );
  }

  private assertLine(lineNumber: number): void {
    if (!Number.isInteger(lineNumber) || lineNumber < 1 || lineNumber > this.lineCount) {
      throw new RangeError(`Line ${lineNumber} is outside ${this.source} (1-${this.lineCount})`);
    }
  }

  private assertRange(range: LineRange): void {
    if (!this.contains(range)) {
      throw new RangeError(
        `Line range ${range.start}-${range.end} is outside ${this.source} (1-${this.lineCount})`
      );
    }
  }
}
