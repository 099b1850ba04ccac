/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/**
 * One `LINK:` reference within a line. Offsets are zero-based string indices.
 *
 * `// See LINK: docs/setup.md:12#install for details`
 * spans `LINK: docs/setup.md:12#install`; the target is `docs/setup.md:12#install`.
 */
export interface LinkAnchorInfo {
  /** Start of the keyword. */
  spanStart: number;
  /** Keyword through end of target. */
  spanLength: number;
  /** Start of the part after the keyword, colon and whitespace. */
  targetStart: number;
  targetLength: number;
  /** Path as written, prefix included; undefined for local anchors. */
  filePath?: string;
  /** `./`, `../`+, `/`, `~/`, `@/` or empty. */
  pathPrefix: string;
  isLocalAnchor: boolean;
  anchorName?: string;
  lineNumber?: number;
  /** Only set when greater than lineNumber. */
  endLineNumber?: number;
}
