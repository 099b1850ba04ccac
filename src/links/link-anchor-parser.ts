/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { hasFileExtension, isPathLike, splitPathPrefix } from '../common/path-utils';
import type { LinkAnchorInfo } from './types';

/**
 * `LINK` as a whole word, optionally followed by `:`. The keyword may not continue a
 * path (`docs/LINK.md`) unless it directly follows a comment opener (`//LINK:`).
 */
const KEYWORD_REGEX = /(?:(?<![\w.\\@~/-])|(?<=\/\/)|(?<=\/\*))(link)\b(\s*:)?[ \t]*/gi;

/** Start of a `:line` or `#anchor` suffix. */
const SUFFIX_REGEX = /#|:(\d+)/g;

const TERMINATOR_REGEX = /#|:\d/;

const BODY_END_REGEX = /\*\/|-->|[\r\n]/;

interface Keyword {
  start: number;
  end: number;
}

interface TargetParts {
  filePath: string;
  lineNumber?: number;
  endLineNumber?: number;
  anchorName?: string;
  /** Characters of the target that belong to the link. */
  length: number;
}

function findKeywords(line: string): Keyword[] {
  const keywords: Keyword[] = [];
  KEYWORD_REGEX.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = KEYWORD_REGEX.exec(line)) !== null) {
    // only the uppercase spelling may leave out the colon
    if (m[1] !== 'LINK' && m[2] === undefined) continue;
    keywords.push({ start: m.index, end: m.index + m[0].length });
  }
  return keywords;
}

/**
 * The path runs from the first word through the last word that looks like a path,
 * e.g. `images/Add group calendar.png for details` ends at `calendar.png`.
 * A word carrying a `:line` or `#anchor` suffix always ends it, and so does
 * prose after a file name: `file.cs see Foo.Bar` ends at `file.cs`.
 */
function targetText(body: string): string {
  const words = [...body.matchAll(/\S+/g)];
  if (words.length === 0) return '';
  let last = 0;
  let afterFileName = false;
  for (let i = 0; i < words.length; i++) {
    const word = words[i][0];
    if (TERMINATOR_REGEX.test(word)) {
      last = i;
      break;
    }
    if (!isPathLike(word)) {
      if (afterFileName) break;
      continue;
    }
    last = i;
    afterFileName = hasFileExtension(word);
  }
  const word = words[last];
  return body.slice(0, (word.index ?? 0) + word[0].length);
}

function splitTarget(target: string): TargetParts | undefined {
  SUFFIX_REGEX.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = SUFFIX_REGEX.exec(target)) !== null) {
    const filePath = target.slice(0, m.index);
    if (m[0] === '#') {
      const anchorName = target.slice(m.index + 1);
      if (!anchorName) return filePath ? { filePath, length: m.index } : undefined;
      return filePath ? { filePath, anchorName, length: target.length } : undefined;
    }

    const lineNumber = Number(m[1]);
    let end = m.index + m[0].length;
    // ":0" and ":12abc" are part of the path
    if (lineNumber === 0 || !/^(?:$|[-#])/.test(target.slice(end))) continue;
    if (!filePath) return undefined;

    let endLineNumber: number | undefined;
    if (target.charAt(end) === '-') {
      const range = /^-(\d+)/.exec(target.slice(end));
      if (!range || Number(range[1]) <= lineNumber) return { filePath, lineNumber, length: end };
      endLineNumber = Number(range[1]);
      end += range[0].length;
    }
    const anchor = /^#(\S+)/.exec(target.slice(end));
    if (anchor) return { filePath, lineNumber, endLineNumber, anchorName: anchor[1], length: end + anchor[0].length };
    return { filePath, lineNumber, endLineNumber, length: end };
  }
  return target ? { filePath: target, length: target.length } : undefined;
}

function readLink(line: string, keyword: Keyword, bodyEnd: number): LinkAnchorInfo | undefined {
  let body = line.slice(keyword.end, bodyEnd);
  const stop = BODY_END_REGEX.exec(body);
  if (stop) body = body.slice(0, stop.index);

  if (body.startsWith('#')) {
    const local = /^#(\S+)/.exec(body);
    if (!local) return undefined;
    return {
      spanStart: keyword.start,
      spanLength: keyword.end - keyword.start + local[0].length,
      targetStart: keyword.end,
      targetLength: local[0].length,
      pathPrefix: '',
      isLocalAnchor: true,
      anchorName: local[1],
    };
  }

  const parts = splitTarget(targetText(body));
  if (!parts) return undefined;
  return {
    spanStart: keyword.start,
    spanLength: keyword.end - keyword.start + parts.length,
    targetStart: keyword.end,
    targetLength: parts.length,
    filePath: parts.filePath,
    pathPrefix: splitPathPrefix(parts.filePath).prefix,
    isLocalAnchor: false,
    anchorName: parts.anchorName,
    lineNumber: parts.lineNumber,
    endLineNumber: parts.endLineNumber,
  };
}

/**
 * All `LINK:` references of a line, left to right. A body runs to the next keyword,
 * the end of the line or a comment closer (`*` `/`, `-->`).
 */
export function parseLinks(line: string): LinkAnchorInfo[] {
  if (!/link/i.test(line)) return [];
  const keywords = findKeywords(line);
  const links: LinkAnchorInfo[] = [];
  keywords.forEach((keyword, i) => {
    const next = keywords[i + 1];
    const link = readLink(line, keyword, next ? next.start : line.length);
    if (link) links.push(link);
  });
  return links;
}

/**
 * Link whose target contains the offset; the keyword itself does not count.
 * The position right after the target still selects the link, as a caret there would.
 */
export function findLinkAt(line: string, offset: number): LinkAnchorInfo | undefined {
  if (offset < 0 || offset >= line.length) return undefined;
  return parseLinks(line).find(
    (link) => offset >= link.targetStart && offset <= link.targetStart + link.targetLength
  );
}

export function containsLinkAnchor(line: string): boolean {
  return parseLinks(line).length > 0;
}
