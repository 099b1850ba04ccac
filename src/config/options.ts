/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Caller-supplied configuration, validated once at the boundary and frozen.
*/

import { z } from 'zod';
import { invalidConfig } from '../common/errors';
import { BUILT_IN_TAGS, normalizeTagList, parseCustomTags } from '../tags/tag-list';

export const DEFAULT_MAX_LINE_LENGTH = 120;

export const ReflowConfigSchema = z
  .object({
    /** Maximum physical line length, indentation and comment marker included */
    maxLineLength: z.number().int().min(1).default(DEFAULT_MAX_LINE_LENGTH),
    /** Collapse short elements onto a single line */
    useCompactStyle: z.boolean().default(true),
    /** Keep blank comment lines as paragraph separators */
    preserveBlankLines: z.boolean().default(true),
  })
  .strict();

export type ReflowConfig = Readonly<z.infer<typeof ReflowConfigSchema>>;

const TAG_NAME_REGEX = /^[A-Za-z_][\w-]*$/;

const tagNameList = z.array(z.string().trim().regex(TAG_NAME_REGEX, 'Tag names are letters, digits, _ or -'));

export const TagOptionsSchema = z
  .object({
    /** Tags recognized out of the box */
    knownTags: tagNameList.default([...BUILT_IN_TAGS]),
    /** Extra tags, either a list or the comma-separated setting string */
    customTags: z
      .union([z.string().transform((setting) => parseCustomTags(setting)), tagNameList])
      .default([]),
  })
  .strict();

export interface TagOptions {
  readonly knownTags: readonly string[];
  readonly customTags: readonly string[];
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate reflow settings and fill in defaults.
 * @throws CommentKitError (INVALID_CONFIG) when a value is out of range, e.g. maxLineLength 0
 */
export function createReflowConfig(input: unknown = {}): ReflowConfig {
  const result = ReflowConfigSchema.safeParse(input);
  if (!result.success) {
    throw invalidConfig('reflow config', describeIssues(result.error), result.error);
  }
  return Object.freeze({ ...result.data });
}

/**
 * Validate tag lists and fill in the built-in tags.
 * @throws CommentKitError (INVALID_CONFIG) for tag names that cannot form a whole word
 */
export function createTagOptions(input: unknown = {}): TagOptions {
  const result = TagOptionsSchema.safeParse(input);
  if (!result.success) {
    throw invalidConfig('tag options', describeIssues(result.error), result.error);
  }
  return Object.freeze({
    knownTags: Object.freeze(normalizeTagList(result.data.knownTags)),
    customTags: Object.freeze(normalizeTagList(result.data.customTags)),
  });
}
