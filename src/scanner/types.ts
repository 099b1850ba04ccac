/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { CommentStyle } from '../styles/comment-styles';

/**
 * A maximal run of documentation comment lines. Produced by the scanner and
 * never mutated; an edited buffer is scanned again.
 */
export interface CommentBlock {
  /** Zero-based first line. */
  readonly startLine: number;
  /** Zero-based last line, inclusive. */
  readonly endLine: number;
  /** Source lines startLine..endLine as they appear in the buffer. */
  readonly rawLines: readonly string[];
  readonly style: CommentStyle;
  /** Whitespace before the marker on the first line. */
  readonly indentation: string;
  /** True for `/** ... *\/` blocks, false for runs of single-line markers. */
  readonly isBlockStyle: boolean;
}
