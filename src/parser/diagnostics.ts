/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XMLValidator } from 'fast-xml-parser';
import { blockContentEntries } from '../scanner/block-scanner';
import type { CommentBlock } from '../scanner/types';
import type { MarkupDiagnostic } from './types';

const WRAPPER_OPEN = '<doc>';
const WRAPPER_CLOSE = '</doc>';

/**
 * Well-formedness check of documentation markup. Lines and columns are zero-based
 * positions within `text`. The validator stops at the first problem, so there is
 * at most one diagnostic.
 */
export function diagnoseDocXml(text: string): MarkupDiagnostic[] {
  const result = XMLValidator.validate(WRAPPER_OPEN + text + WRAPPER_CLOSE);
  if (result === true) return [];
  const { code, msg, line, col } = result.err;
  const lineIndex = Math.max(0, line - 1);
  const column = Math.max(0, lineIndex === 0 ? col - 1 - WRAPPER_OPEN.length : col - 1);
  return [{ line: lineIndex, column, code, message: msg }];
}

/**
 * Well-formedness check of a block's body, with diagnostics placed on buffer lines.
 * Parsing never depends on this; malformed markup still yields a node list.
 */
export function diagnoseBlock(block: CommentBlock): MarkupDiagnostic[] {
  const entries = blockContentEntries(block);
  return diagnoseDocXml(entries.map((e) => e.text).join('\n')).map((diagnostic) => {
    const entry = entries[Math.min(diagnostic.line, entries.length - 1)];
    return { ...diagnostic, line: entry ? entry.line : block.startLine };
  });
}

export function isMarkupWellFormed(block: CommentBlock): boolean {
  return diagnoseBlock(block).length === 0;
}
