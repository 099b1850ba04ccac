/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export interface TagMetadata {
  /** From `@name`, without the `@`. */
  owner?: string;
  /** From `#1234`. */
  issue?: number;
  /** Valid `yyyy-MM-dd` date, as written. */
  dueDate?: string;
}

/** Tag keyword found at the start of a comment in one line. */
export interface TagMatch extends TagMetadata {
  /** Spelling from the tag list, e.g. "TODO" for `todo:`. */
  tagName: string;
  /** Start of the keyword. */
  spanStart: number;
  /** Keyword, metadata section and colon; the message is not included. */
  spanLength: number;
  /** Text between the metadata brackets. */
  rawMetadata?: string;
  /** Rest of the comment, closers and surrounding whitespace removed. */
  message: string;
  /** Name declared by `ANCHOR(name)`. */
  anchorId?: string;
}

/** Tag match placed in a file, as listed and exported. */
export interface TagItem extends TagMetadata {
  tagName: string;
  message: string;
  filePath: string;
  fileName: string;
  /** 1-based. */
  lineNumber: number;
  /** 0-based column of the keyword. */
  column: number;
  project?: string;
  anchorId?: string;
}
