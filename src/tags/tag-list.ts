/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/** Tags recognized without any configuration. */
export const BUILT_IN_TAGS: readonly string[] = Object.freeze([
  'TODO',
  'HACK',
  'NOTE',
  'BUG',
  'FIXME',
  'UNDONE',
  'REVIEW',
  'ANCHOR',
]);

/** Tag whose metadata names a navigation target rather than an owner. */
export const ANCHOR_TAG = 'ANCHOR';

/**
 * Trim, drop empties and de-duplicate case-insensitively; the first spelling wins.
 */
export function normalizeTagList(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (!tag) continue;
    const key = tag.toUpperCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(tag);
  }
  return result;
}

/**
 * Parse the comma-separated custom tag setting, e.g. "PERF, SECURITY,perf" → ['PERF', 'SECURITY'].
 */
export function parseCustomTags(setting: string | undefined): string[] {
  if (!setting) return [];
  return normalizeTagList(setting.split(','));
}

/** Known tags followed by custom tags not already known. */
export function mergeTagLists(knownTags: readonly string[], customTags: readonly string[]): string[] {
  return normalizeTagList([...knownTags, ...customTags]);
}
