/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Per-language documentation comment delimiters. Read-only, process-wide.
*/

export interface CommentStyle {
  /** Language the style belongs to, e.g. "CSharp". */
  readonly languageId: string;
  /** Single-line documentation marker, e.g. "///" or "'''". */
  readonly lineMarker: string;
  /** Opening delimiter of block documentation comments, e.g. "/**". */
  readonly blockOpen?: string;
  readonly blockClose?: string;
  /** Prefix of the lines between blockOpen and blockClose, e.g. " * ". */
  readonly blockContinuation?: string;
}

function defineStyle(style: CommentStyle): CommentStyle {
  return Object.freeze({ ...style });
}

export const CSHARP_STYLE = defineStyle({
  languageId: 'CSharp',
  lineMarker: '///',
  blockOpen: '/**',
  blockClose: '*/',
  blockContinuation: ' * ',
});

export const VISUAL_BASIC_STYLE = defineStyle({ languageId: 'Basic', lineMarker: "'''" });

export const CPP_STYLE = defineStyle({
  languageId: 'C/C++',
  lineMarker: '///',
  blockOpen: '/**',
  blockClose: '*/',
  blockContinuation: ' * ',
});

export const FSHARP_STYLE = defineStyle({ languageId: 'FSharp', lineMarker: '///' });

export const TYPESCRIPT_STYLE = defineStyle({ languageId: 'TypeScript', lineMarker: '///' });

export const JAVASCRIPT_STYLE = defineStyle({ languageId: 'JavaScript', lineMarker: '///' });

export const COMMENT_STYLES: readonly CommentStyle[] = Object.freeze([
  CSHARP_STYLE,
  VISUAL_BASIC_STYLE,
  CPP_STYLE,
  FSHARP_STYLE,
  TYPESCRIPT_STYLE,
  JAVASCRIPT_STYLE,
]);

// Checked in order; the first alias contained in the content type wins.
const CONTENT_TYPE_ALIASES: ReadonlyArray<[string[], CommentStyle]> = [
  [['csharp'], CSHARP_STYLE],
  [['basic'], VISUAL_BASIC_STYLE],
  [['c/c++', 'c++'], CPP_STYLE],
  [['f#', 'fsharp'], FSHARP_STYLE],
  [['typescript'], TYPESCRIPT_STYLE],
  [['javascript'], JAVASCRIPT_STYLE],
];

/**
 * Look up the style for an editor content type name (case-insensitive substring match,
 * so "RazorCSharp" resolves to C#). Unknown or empty content types have no style.
 */
export function getStyleForContentType(contentType: string | undefined): CommentStyle | undefined {
  if (!contentType) return undefined;
  const needle = contentType.toLowerCase();
  for (const [aliases, style] of CONTENT_TYPE_ALIASES) {
    if (aliases.some((alias) => needle.includes(alias))) return style;
  }
  return undefined;
}

export function supportsBlockDoc(style: CommentStyle): boolean {
  return !!style.blockOpen && !!style.blockClose;
}

const COMMENT_LINE_REGEX = /^\s*(\/\/|\/\*|\*|')/;

/** Whether a line starts with any comment prefix (`//`, `/*`, `*` or `'`). */
export function isCommentLine(line: string): boolean {
  return COMMENT_LINE_REGEX.test(line);
}
