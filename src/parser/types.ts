/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Node in the XML documentation tree of one comment block.
*/

/**
 * Closed set of element behaviours:
 * - block: always starts a new line (summary, param, list, ...)
 * - inline: shares a line with text and wraps as one unit (c, see, paramref, ...)
 * - code: verbatim, never rewrapped
 * - generic: unknown tags, laid out like inline
 */
export type ElementKind = 'block' | 'inline' | 'code' | 'generic';

export interface XmlTextNode {
  readonly kind: 'text';
  /** Literal text, entities untouched; may contain line breaks. */
  readonly content: string;
}

/** A whitespace-only line between content. */
export interface XmlBlankLineNode {
  readonly kind: 'blank';
}

export interface XmlElementNode {
  readonly kind: 'element';
  readonly tagName: string;
  /** Attribute values with entities decoded. */
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
  readonly elementKind: ElementKind;
  /** True for inline and generic elements. */
  readonly isInline: boolean;
  readonly selfClosing: boolean;
  /** Opening tag exactly as written, e.g. `<param name="id">`. */
  readonly openTag: string;
  /** Closing tag exactly as written; empty for self-closing elements. */
  readonly closeTag: string;
  /** Source text between the opening and closing tag. */
  readonly rawContent: string;
}

export type XmlNode = XmlTextNode | XmlBlankLineNode | XmlElementNode;

/**
 * Well-formedness problem in a block's markup. Reported for display only;
 * parsing itself never fails.
 */
export interface MarkupDiagnostic {
  /** Zero-based buffer line. */
  line: number;
  /** Zero-based column within the comment content of that line. */
  column: number;
  code: string;
  message: string;
}
