/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { blockContentLines } from '../scanner/block-scanner';
import type { CommentBlock } from '../scanner/types';
import { elementKindOf, readStartTag } from './tag-markup';
import type { XmlElementNode, XmlNode } from './types';

/** Element still waiting for its closing tag. */
interface OpenFrame {
  tagName: string;
  attributes: Record<string, string>;
  openTag: string;
  contentStart: number;
  children: XmlNode[];
}

type Markup =
  | { type: 'start'; end: number; tagName: string; attributes: Record<string, string>; selfClosing: boolean }
  | { type: 'end'; end: number; tagName: string };

const NAME_START_REGEX = /[A-Za-z_:]/;
const END_TAG_REGEX = /<\/([A-Za-z_:][\w.:-]*)\s*>/y;

function appendText(children: XmlNode[], content: string): void {
  if (content === '') return;
  const last = children[children.length - 1];
  if (last && last.kind === 'text') {
    children[children.length - 1] = { kind: 'text', content: last.content + content };
  } else {
    children.push({ kind: 'text', content });
  }
}

/**
 * Append source text, turning whitespace-only lines into blank nodes. A line only
 * counts as blank when the text both starts and ends it, so the remainder of a
 * line that holds a tag never does. Line breaks next to a blank line are absorbed.
 */
function appendSourceText(children: XmlNode[], src: string, start: number, end: number): void {
  if (end <= start) return;
  const segments = src.slice(start, end).split('\n');
  const startsLine = start === 0;
  const endsLine = end === src.length;
  let run: string[] = [];
  segments.forEach((segment, i) => {
    const fullLine = (i > 0 || startsLine) && (i < segments.length - 1 || endsLine);
    if (fullLine && segment.trim() === '') {
      appendText(children, run.join('\n'));
      children.push({ kind: 'blank' });
      run = [];
    } else {
      run.push(segment);
    }
  });
  appendText(children, run.join('\n'));
}

function readMarkup(src: string, lt: number): Markup | undefined {
  const next = src.charAt(lt + 1);
  if (next === '/') {
    END_TAG_REGEX.lastIndex = lt;
    const m = END_TAG_REGEX.exec(src);
    return m ? { type: 'end', end: lt + m[0].length, tagName: m[1] } : undefined;
  }
  if (!NAME_START_REGEX.test(next)) return undefined;

  let quote: string | undefined;
  let i = lt + 1;
  for (; i < src.length; i++) {
    const ch = src[i];
    if (quote) {
      if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '<') {
      return undefined;
    } else if (ch === '>') {
      break;
    }
  }
  if (i >= src.length) return undefined;

  const tag = readStartTag(src.slice(lt, i + 1));
  if (!tag) return undefined;
  return { type: 'start', end: i + 1, tagName: tag.name, attributes: tag.attributes, selfClosing: tag.selfClosing };
}

function makeElement(
  tagName: string,
  attributes: Record<string, string>,
  children: XmlNode[],
  openTag: string,
  closeTag: string,
  rawContent: string
): XmlElementNode {
  const elementKind = elementKindOf(tagName);
  return {
    kind: 'element',
    tagName,
    attributes,
    children,
    elementKind,
    isInline: elementKind === 'inline' || elementKind === 'generic',
    selfClosing: closeTag === '',
    openTag,
    closeTag,
    rawContent,
  };
}

/** An element that never closed: its opening tag is literal text, its children move up. */
function degrade(frame: OpenFrame, into: XmlNode[]): void {
  appendText(into, frame.openTag);
  for (const child of frame.children) {
    if (child.kind === 'text') appendText(into, child.content);
    else into.push(child);
  }
}

/**
 * Parse the markup of a documentation comment body into a node list.
 * Never throws: markup that does not form an element stays literal text.
 */
export function parseDocXml(src: string): XmlNode[] {
  const root: XmlNode[] = [];
  const stack: OpenFrame[] = [];
  const top = (): XmlNode[] => (stack.length > 0 ? stack[stack.length - 1].children : root);

  let pos = 0;
  let textStart = 0;
  while (pos < src.length) {
    const lt = src.indexOf('<', pos);
    if (lt < 0) break;
    const markup = readMarkup(src, lt);
    if (!markup) {
      pos = lt + 1;
      continue;
    }

    if (markup.type === 'start') {
      const openTag = src.slice(lt, markup.end);
      if (markup.selfClosing) {
        appendSourceText(top(), src, textStart, lt);
        top().push(makeElement(markup.tagName, markup.attributes, [], openTag, '', ''));
      } else if (elementKindOf(markup.tagName) === 'code') {
        // code content is opaque: take everything up to the matching end tag
        const closeRegex = new RegExp(`</${markup.tagName}\\s*>`, 'g');
        closeRegex.lastIndex = markup.end;
        const close = closeRegex.exec(src);
        if (!close) {
          pos = markup.end;
          continue;
        }
        appendSourceText(top(), src, textStart, lt);
        const rawContent = src.slice(markup.end, close.index);
        const children: XmlNode[] = rawContent ? [{ kind: 'text', content: rawContent }] : [];
        top().push(makeElement(markup.tagName, markup.attributes, children, openTag, close[0], rawContent));
        pos = textStart = close.index + close[0].length;
        continue;
      } else {
        appendSourceText(top(), src, textStart, lt);
        stack.push({
          tagName: markup.tagName,
          attributes: markup.attributes,
          openTag,
          contentStart: markup.end,
          children: [],
        });
      }
      pos = textStart = markup.end;
      continue;
    }

    let match = stack.length - 1;
    while (match >= 0 && stack[match].tagName !== markup.tagName) match--;
    if (match < 0) {
      // stray end tag stays in the text run
      pos = markup.end;
      continue;
    }
    appendSourceText(top(), src, textStart, lt);
    while (stack.length - 1 > match) {
      const unclosed = stack.pop();
      if (unclosed) degrade(unclosed, top());
    }
    const frame = stack.pop();
    if (frame) {
      top().push(
        makeElement(
          frame.tagName,
          frame.attributes,
          frame.children,
          frame.openTag,
          src.slice(lt, markup.end),
          src.slice(frame.contentStart, lt)
        )
      );
    }
    pos = textStart = markup.end;
  }

  appendSourceText(top(), src, textStart, src.length);
  while (stack.length > 0) {
    const unclosed = stack.pop();
    if (unclosed) degrade(unclosed, top());
  }
  return root;
}

/** Parse the documentation markup of a scanned comment block. */
export function parseBlock(block: CommentBlock): XmlNode[] {
  return parseDocXml(blockContentLines(block).join('\n'));
}

/**
 * Text of a node list with markup removed and whitespace collapsed,
 * e.g. for hover text. Self-closing references contribute nothing.
 */
export function textContent(nodes: readonly XmlNode[]): string {
  const parts: string[] = [];
  const walk = (list: readonly XmlNode[]): void => {
    for (const node of list) {
      if (node.kind === 'text') parts.push(node.content);
      else if (node.kind === 'blank') parts.push('\n');
      else walk(node.children);
    }
  };
  walk(nodes);
  return parts.join('').replace(/\s+/g, ' ').trim();
}

/** All elements with the given tag name (case-insensitive), in document order. */
export function findElements(nodes: readonly XmlNode[], tagName: string): XmlElementNode[] {
  const wanted = tagName.toLowerCase();
  const found: XmlElementNode[] = [];
  const walk = (list: readonly XmlNode[]): void => {
    for (const node of list) {
      if (node.kind !== 'element') continue;
      if (node.tagName.toLowerCase() === wanted) found.push(node);
      walk(node.children);
    }
  };
  walk(nodes);
  return found;
}
