/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { BUILT_IN_TAGS, ANCHOR_TAG, normalizeTagList, parseCustomTags, mergeTagLists } from './tag-list';
export { parseTags, parseTagMetadata, isValidCalendarDate, isInsideStringLiteral } from './tag-parser';
export { scanTags, MAX_SCAN_LENGTH } from './tag-scanner';
export type { ScanOptions } from './tag-scanner';
export type { TagMatch, TagMetadata, TagItem } from './types';
