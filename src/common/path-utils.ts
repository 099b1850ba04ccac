/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Path helpers for LINK targets and tag export rows.
  Purely lexical: nothing here touches the filesystem.
*/

/**
 * Root a link path is relative to, derived from its prefix.
 * `/` and `~/` point at the solution root, `@/` at the project root.
 */
export type PathRoot = 'document' | 'solution' | 'project';

export interface PathPrefixSplit {
  /** Literal prefix, e.g. "../../" or "~/"; empty when the path has none. */
  prefix: string;
  /** Remainder of the path after the prefix. */
  rest: string;
  root: PathRoot;
}

const EXTENSION_REGEX = /\.[A-Za-z0-9_-]+$/;

/**
 * Split a link path into its prefix (`./`, `../`+, `/`, `~/`, `@/`) and the rest.
 * e.g. '../../shared/a.ts' → { prefix: '../../', rest: 'shared/a.ts', root: 'document' }
 */
export function splitPathPrefix(pathStr: string): PathPrefixSplit {
  const parent = pathStr.match(/^(?:\.\.\/)+/);
  if (parent) return { prefix: parent[0], rest: pathStr.slice(parent[0].length), root: 'document' };
  if (pathStr.startsWith('./')) return { prefix: './', rest: pathStr.slice(2), root: 'document' };
  if (pathStr.startsWith('~/')) return { prefix: '~/', rest: pathStr.slice(2), root: 'solution' };
  if (pathStr.startsWith('@/')) return { prefix: '@/', rest: pathStr.slice(2), root: 'project' };
  if (pathStr.startsWith('/')) return { prefix: '/', rest: pathStr.slice(1), root: 'solution' };
  return { prefix: '', rest: pathStr, root: 'document' };
}

/**
 * Split a path into its segments on `/` and `\`, dropping empty and `.` segments.
 * e.g. './src\\lib//a.ts' → ['src', 'lib', 'a.ts']
 */
export function splitPathSegments(pathStr: string): string[] {
  return pathStr.split(/[/\\]/).filter((seg) => seg !== '' && seg !== '.');
}

/** Last path segment, or '' for an empty path. */
export function fileNameOf(pathStr: string): string {
  const segs = splitPathSegments(pathStr);
  return segs.length > 0 ? segs[segs.length - 1] : '';
}

/**
 * Whether a whitespace-free word reads like (the end of) a file path:
 * it has a path separator, a link prefix or a file extension.
 */
export function isPathLike(word: string): boolean {
  if (word.length === 0) return false;
  if (word.includes('/') || word.includes('\\')) return true;
  return hasFileExtension(word);
}

/** Whether a word ends in a file extension, e.g. `calendar.png`. */
export function hasFileExtension(word: string): boolean {
  return EXTENSION_REGEX.test(word);
}
