/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { supportsBlockDoc } from '../styles/comment-styles';
import type { CommentStyle } from '../styles/comment-styles';
import { lineAt } from '../text/text-snapshot';
import type { TextSnapshot } from '../text/text-snapshot';
import type { CommentBlock } from './types';

function leadingWhitespace(line: string): string {
  const m = line.match(/^\s*/);
  return m ? m[0] : '';
}

function startsWithMarker(line: string, marker: string): boolean {
  return line.trimStart().startsWith(marker);
}

function makeBlock(
  lines: readonly string[],
  startLine: number,
  endLine: number,
  style: CommentStyle,
  isBlockStyle: boolean
): CommentBlock {
  return Object.freeze({
    startLine,
    endLine,
    rawLines: Object.freeze(lines.slice(startLine, endLine + 1)),
    style,
    indentation: leadingWhitespace(lines[startLine]),
    isBlockStyle,
  });
}

function tryLineMarkerBlock(
  lines: readonly string[],
  startLine: number,
  style: CommentStyle
): CommentBlock | undefined {
  if (!startsWithMarker(lines[startLine], style.lineMarker)) return undefined;
  let endLine = startLine;
  while (endLine + 1 < lines.length && startsWithMarker(lines[endLine + 1], style.lineMarker)) {
    endLine++;
  }
  return makeBlock(lines, startLine, endLine, style, false);
}

function tryBlockCommentBlock(
  lines: readonly string[],
  startLine: number,
  style: CommentStyle
): CommentBlock | undefined {
  const open = style.blockOpen;
  const close = style.blockClose;
  if (!open || !close) return undefined;
  const trimmed = lines[startLine].trimStart();
  // "/**/" is an empty ordinary comment, not documentation
  if (!trimmed.startsWith(open) || trimmed.startsWith(open.slice(0, -1) + close)) return undefined;

  if (trimmed.indexOf(close, open.length) >= 0) {
    return makeBlock(lines, startLine, startLine, style, true);
  }
  let endLine = startLine;
  while (endLine + 1 < lines.length) {
    endLine++;
    if (lines[endLine].includes(close)) break;
  }
  return makeBlock(lines, startLine, endLine, style, true);
}

function tryBlockAt(lines: readonly string[], startLine: number, style: CommentStyle): CommentBlock | undefined {
  const single = tryLineMarkerBlock(lines, startLine, style);
  if (single) return single;
  if (supportsBlockDoc(style)) return tryBlockCommentBlock(lines, startLine, style);
  return undefined;
}

/**
 * Find every documentation comment block in a line sequence, in document order.
 * A style of undefined (unsupported content type) yields no blocks.
 */
export function findAllBlocks(lines: readonly string[], style: CommentStyle | undefined): CommentBlock[] {
  const blocks: CommentBlock[] = [];
  if (!style) return blocks;
  let line = 0;
  while (line < lines.length) {
    const block = tryBlockAt(lines, line, style);
    if (block) {
      blocks.push(block);
      line = block.endLine + 1;
    } else {
      line++;
    }
  }
  return blocks;
}

/**
 * Block containing the character offset, or undefined when the offset is not inside one.
 */
export function findBlockAtPosition(
  snapshot: TextSnapshot,
  offset: number,
  style: CommentStyle | undefined
): CommentBlock | undefined {
  const line = lineAt(snapshot, offset);
  if (line < 0) return undefined;
  return findAllBlocks(snapshot.lines, style).find((b) => b.startLine <= line && line <= b.endLine);
}

/**
 * Blocks intersecting lines startLine..endLine, including a block that begins above startLine.
 */
export function findBlocksInRange(
  lines: readonly string[],
  startLine: number,
  endLine: number,
  style: CommentStyle | undefined
): CommentBlock[] {
  return findAllBlocks(lines, style).filter((b) => b.endLine >= startLine && b.startLine <= endLine);
}

function stripOneSpace(text: string): string {
  return text.startsWith(' ') ? text.slice(1) : text;
}

function stripContinuation(text: string, close: string): string {
  const trimmed = text.trimStart();
  if (trimmed.startsWith('*') && !trimmed.startsWith(close)) return stripOneSpace(trimmed.slice(1));
  return text;
}

export interface ContentLine {
  /** Zero-based buffer line the text came from. */
  line: number;
  text: string;
}

/**
 * The block's text with comment markers removed, paired with source line numbers:
 * indentation, the marker and one following space are stripped per line.
 * Block-style delimiter lines without content are dropped.
 */
export function blockContentEntries(block: CommentBlock): ContentLine[] {
  const { style } = block;
  if (!block.isBlockStyle) {
    return block.rawLines.map((raw, i) => {
      const afterMarker = raw.trimStart().slice(style.lineMarker.length);
      return { line: block.startLine + i, text: stripOneSpace(afterMarker).trimEnd() };
    });
  }

  const open = style.blockOpen ?? '/**';
  const close = style.blockClose ?? '*/';
  const result: ContentLine[] = [];
  const last = block.rawLines.length - 1;
  block.rawLines.forEach((raw, i) => {
    let text = i === 0 ? raw.trimStart().slice(open.length) : raw;
    let closing = false;
    const closeIndex = text.indexOf(close);
    if (closeIndex >= 0 && (i === last || i === 0)) {
      text = text.slice(0, closeIndex);
      closing = true;
    }
    text = i === 0 ? stripOneSpace(text) : stripContinuation(text, close);
    text = text.trimEnd();
    if ((i === 0 || closing) && text.trim() === '') return;
    result.push({ line: block.startLine + i, text });
  });
  return result;
}

/** Text of {@link blockContentEntries} without line numbers. */
export function blockContentLines(block: CommentBlock): string[] {
  return blockContentEntries(block).map((entry) => entry.text);
}
