/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { XmlElementNode, XmlNode } from '../parser/types';

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ');
}

/**
 * One-line serialization of an element that wraps as a single unit,
 * e.g. `<see cref="Widget"/>` or `<c>a b</c>`.
 */
export function serializeInline(element: XmlElementNode): string {
  if (element.selfClosing) return collapseWhitespace(element.openTag);
  const inner = element.children
    .map((child) => {
      if (child.kind === 'text') return collapseWhitespace(child.content);
      if (child.kind === 'blank') return ' ';
      return serializeInline(child);
    })
    .join('');
  return collapseWhitespace(element.openTag) + collapseWhitespace(inner) + collapseWhitespace(element.closeTag);
}

/**
 * Split a run of text and inline elements into wrap tokens. Tokens are maximal
 * non-whitespace runs; an inline element is one unit and glues to text it touches,
 * so `(<c>x</c>),` stays a single token. Blank nodes always end a token.
 */
export function tokenizeRun(nodes: readonly XmlNode[]): string[] {
  const tokens: string[] = [];
  let current = '';
  const flush = (): void => {
    if (current) tokens.push(current);
    current = '';
  };
  for (const node of nodes) {
    if (node.kind === 'blank') {
      flush();
    } else if (node.kind === 'element') {
      current += serializeInline(node);
    } else {
      const pieces = node.content.split(/(\s+)/);
      for (const piece of pieces) {
        if (piece === '') continue;
        if (/^\s+$/.test(piece)) flush();
        else current += piece;
      }
    }
  }
  flush();
  return tokens;
}

/**
 * Greedy fill: a token joins the current line while `length + 1 + token.length <= width`.
 * A token wider than `width` gets a line of its own and is never split.
 */
export function wrapTokens(tokens: readonly string[], width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const token of tokens) {
    if (line === '') {
      line = token;
    } else if (line.length + 1 + token.length <= width) {
      line += ' ' + token;
    } else {
      lines.push(line);
      line = token;
    }
  }
  if (line !== '') lines.push(line);
  return lines;
}
