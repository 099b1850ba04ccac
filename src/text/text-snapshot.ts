/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Immutable "ordered lines + offsets" view of a text buffer. Editor adapters
  build one per query from their live buffer.
*/

export interface TextSnapshot {
  readonly text: string;
  /** Lines without their line breaks. */
  readonly lines: readonly string[];
  /** Character offset of the first character of each line. */
  readonly lineStarts: readonly number[];
}

export interface TextSpan {
  start: number;
  length: number;
}

const LINE_BREAK_REGEX = /\r\n|\r|\n/g;

export function createTextSnapshot(text: string): TextSnapshot {
  const lines: string[] = [];
  const lineStarts: number[] = [];
  let lineStart = 0;
  let m: RegExpExecArray | null;
  LINE_BREAK_REGEX.lastIndex = 0;
  while ((m = LINE_BREAK_REGEX.exec(text)) !== null) {
    lines.push(text.slice(lineStart, m.index));
    lineStarts.push(lineStart);
    lineStart = m.index + m[0].length;
  }
  lines.push(text.slice(lineStart));
  lineStarts.push(lineStart);
  return Object.freeze({
    text,
    lines: Object.freeze(lines),
    lineStarts: Object.freeze(lineStarts),
  });
}

/**
 * Zero-based line containing the offset, or -1 when the offset is outside the text.
 * An offset on a line break belongs to the line it ends.
 */
export function lineAt(snapshot: TextSnapshot, offset: number): number {
  if (offset < 0 || offset > snapshot.text.length) return -1;
  let lo = 0;
  let hi = snapshot.lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (snapshot.lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/** Offset of the first character of a line, or -1 for a line outside the snapshot. */
export function offsetOf(snapshot: TextSnapshot, line: number): number {
  if (line < 0 || line >= snapshot.lineStarts.length) return -1;
  return snapshot.lineStarts[line];
}

/**
 * Span covering lines startLine..endLine (inclusive), without the final line break.
 */
export function lineRangeSpan(snapshot: TextSnapshot, startLine: number, endLine: number): TextSpan {
  const start = offsetOf(snapshot, startLine);
  const lastStart = offsetOf(snapshot, endLine);
  if (start < 0 || lastStart < 0 || endLine < startLine) return { start: 0, length: 0 };
  return { start, length: lastStart + snapshot.lines[endLine].length - start };
}
