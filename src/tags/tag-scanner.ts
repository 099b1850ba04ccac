/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { fileNameOf } from '../common/path-utils';
import type { TagOptions } from '../config/options';
import { createTextSnapshot } from '../text/text-snapshot';
import { BUILT_IN_TAGS, mergeTagLists } from './tag-list';
import { parseTags } from './tag-parser';
import type { TagItem } from './types';

/** Files above this many characters are not scanned. */
export const MAX_SCAN_LENGTH = 150_000;

export interface ScanOptions {
  filePath: string;
  project?: string;
  /** Built-in tags when omitted. */
  tags?: TagOptions;
}

/**
 * Every tag of a file's text, in line order, with 1-based line numbers.
 */
export function scanTags(text: string, options: ScanOptions, logger?: Logger): TagItem[] {
  const log = logger ? logger.clone() : new ConsoleLogger();
  log.setContext('tags');

  if (text.length > MAX_SCAN_LENGTH) {
    log.warn(`skipping ${options.filePath}: ${text.length} characters exceeds the ${MAX_SCAN_LENGTH} limit`);
    return [];
  }
  const knownTags = options.tags?.knownTags ?? BUILT_IN_TAGS;
  const customTags = options.tags?.customTags ?? [];
  const upper = text.toUpperCase();
  if (!mergeTagLists(knownTags, customTags).some((tag) => upper.includes(tag.toUpperCase()))) {
    return [];
  }

  const fileName = fileNameOf(options.filePath);
  const items: TagItem[] = [];
  createTextSnapshot(text).lines.forEach((line, index) => {
    for (const match of parseTags(line, knownTags, customTags)) {
      items.push({
        tagName: match.tagName,
        message: match.message,
        filePath: options.filePath,
        fileName,
        lineNumber: index + 1,
        column: match.spanStart,
        project: options.project,
        owner: match.owner,
        issue: match.issue,
        dueDate: match.dueDate,
        anchorId: match.anchorId,
      });
    }
  });
  log.debug(`${options.filePath}: ${items.length} tag(s)`);
  return items;
}
