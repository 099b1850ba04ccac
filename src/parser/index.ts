/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parseDocXml, parseBlock, textContent, findElements } from './xml-doc-parser';
export { diagnoseDocXml, diagnoseBlock, isMarkupWellFormed } from './diagnostics';
export { elementKindOf, readStartTag } from './tag-markup';
export type { StartTag } from './tag-markup';
export type {
  ElementKind,
  XmlNode,
  XmlTextNode,
  XmlBlankLineNode,
  XmlElementNode,
  MarkupDiagnostic,
} from './types';
