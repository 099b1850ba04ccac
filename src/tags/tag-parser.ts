/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ANCHOR_TAG, mergeTagLists } from './tag-list';
import type { TagMatch, TagMetadata } from './types';

const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const OWNER_REGEX = /^@(\S+)$/;
const ISSUE_REGEX = /^#(\d+)$/;
const METADATA_REGEX = /^\s*(?:\(([^)]*)\)|\[([^\]]*)\])/;
const CLOSER_REGEX = /\*\/|-->/;

/** Whether `text` is exactly `yyyy-MM-dd` and names a day that exists. */
export function isValidCalendarDate(text: string): boolean {
  const m = DATE_REGEX.exec(text);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  // setUTCFullYear keeps years below 100 as written, Date.UTC would not
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Read owner, issue and due date from a metadata section such as `@mads, #1234, 2026-02-01`.
 * Surrounding brackets are optional. Unrecognized tokens are ignored and the first
 * token of each kind wins.
 */
export function parseTagMetadata(raw: string): TagMetadata {
  const metadata: TagMetadata = {};
  const content = raw.trim().replace(/^[([]/, '').replace(/[)\]]$/, '');
  for (const token of content.split(/[\s,;]+/)) {
    if (!token) continue;
    const owner = OWNER_REGEX.exec(token);
    if (owner) {
      metadata.owner ??= owner[1];
      continue;
    }
    const issue = ISSUE_REGEX.exec(token);
    if (issue) {
      const value = Number(issue[1]);
      if (Number.isSafeInteger(value)) metadata.issue ??= value;
      continue;
    }
    if (isValidCalendarDate(token)) metadata.dueDate ??= token;
  }
  return metadata;
}

/**
 * Quote-counting check for a position inside a string literal, verbatim
 * `@"..."` strings included. A heuristic: it only sees the one line.
 */
export function isInsideStringLiteral(text: string, position: number): boolean {
  let quotes = 0;
  let verbatim = false;
  for (let i = 0; i < position; i++) {
    const ch = text[i];
    if (ch === '@' && text[i + 1] === '"') {
      verbatim = true;
      quotes++;
      i++;
      continue;
    }
    if (ch !== '"') continue;
    if (verbatim) {
      // "" inside a verbatim string is an escaped quote
      if (text[i + 1] === '"') {
        i++;
        continue;
      }
      quotes++;
      verbatim = false;
      continue;
    }
    let backslashes = 0;
    for (let j = i - 1; j >= 0 && text[j] === '\\'; j--) backslashes++;
    if (backslashes % 2 === 0) quotes++;
  }
  return quotes % 2 === 1;
}

interface CommentStart {
  /** Index of the first character after the opener. */
  contentStart: number;
}

/**
 * Positions where comment content begins: after `//`, `/*`, `<!--`, or a line-leading `'` or `*`.
 * A line with no opener is taken as comment content already, starting at its first non-blank.
 */
function findCommentStarts(line: string): CommentStart[] {
  const starts: CommentStart[] = [];
  const leading = /^\s*(['*])/.exec(line);
  let from = 0;
  if (leading) {
    starts.push({ contentStart: leading[0].length });
    from = leading[0].length;
  }
  const opener = /\/\/|\/\*|<!--/g;
  opener.lastIndex = from;
  let m: RegExpExecArray | null;
  while ((m = opener.exec(line)) !== null) {
    if (isInsideStringLiteral(line, m.index)) continue;
    starts.push({ contentStart: m.index + m[0].length });
    // the rest of the line is comment text; later openers are content
    break;
  }
  if (starts.length === 0) starts.push({ contentStart: line.length - line.trimStart().length });
  return starts;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildTagRegex(tags: readonly string[]): RegExp {
  // longest first, so that "TODO2" is not cut short by "TODO"
  const alternatives = [...tags].sort((a, b) => b.length - a.length).map(escapeRegExp);
  return new RegExp(`^(?:${alternatives.join('|')})(?![\\w-])`, 'i');
}

function readTag(line: string, at: number, tags: readonly string[], tagRegex: RegExp): TagMatch | undefined {
  const m = tagRegex.exec(line.slice(at));
  if (!m) return undefined;
  const keyword = m[0].toUpperCase();
  const tagName = tags.find((tag) => tag.toUpperCase() === keyword) ?? m[0];

  let pos = at + m[0].length;
  let rawMetadata: string | undefined;
  const meta = METADATA_REGEX.exec(line.slice(pos));
  if (meta) {
    rawMetadata = meta[1] ?? meta[2] ?? '';
    pos += meta[0].length;
  }
  const colon = /^\s*:/.exec(line.slice(pos));
  if (colon) pos += colon[0].length;

  let message = line.slice(pos);
  const closer = CLOSER_REGEX.exec(message);
  if (closer) message = message.slice(0, closer.index);

  const match: TagMatch = {
    tagName,
    spanStart: at,
    spanLength: pos - at,
    message: message.trim(),
  };
  if (rawMetadata !== undefined) {
    match.rawMetadata = rawMetadata;
    Object.assign(match, parseTagMetadata(rawMetadata));
    const anchorId = rawMetadata.trim();
    if (tagName.toUpperCase() === ANCHOR_TAG && anchorId && !match.owner && match.issue === undefined) {
      match.anchorId = anchorId;
    }
  }
  return match;
}

/**
 * Tags at the start of comment content in one line, e.g. `// TODO(@mads, #12): tidy up`.
 * Tag names compare case-insensitively; a tag inside running text is not a match.
 */
export function parseTags(
  line: string,
  knownTags: readonly string[],
  customTags: readonly string[] = []
): TagMatch[] {
  const tags = mergeTagLists(knownTags, customTags);
  if (tags.length === 0) return [];
  const upper = line.toUpperCase();
  if (!tags.some((tag) => upper.includes(tag.toUpperCase()))) return [];

  const tagRegex = buildTagRegex(tags);
  const matches: TagMatch[] = [];
  for (const start of findCommentStarts(line)) {
    const content = /^[/*!\s]*/.exec(line.slice(start.contentStart));
    const at = start.contentStart + (content ? content[0].length : 0);
    // "* // TODO" reaches the same keyword from both openers
    if (matches.some((m) => m.spanStart === at)) continue;
    const match = readTag(line, at, tags, tagRegex);
    if (match) matches.push(match);
  }
  return matches;
}
