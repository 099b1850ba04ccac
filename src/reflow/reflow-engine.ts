/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { createReflowConfig } from '../config/options';
import type { ReflowConfig } from '../config/options';
import { parseBlock } from '../parser/xml-doc-parser';
import type { XmlElementNode, XmlNode } from '../parser/types';
import type { CommentBlock } from '../scanner/types';
import { collapseWhitespace, serializeInline, tokenizeRun, wrapTokens } from './wrap';

/** Content line of the reflowed body; `blank` renders as the bare comment marker. */
type OutputLine = { kind: 'text'; text: string } | { kind: 'blank' };

interface LinePrefix {
  /** Written before every content line. */
  content: string;
  /** A content line with nothing after the marker. */
  blank: string;
}

function linePrefixOf(block: CommentBlock): LinePrefix {
  if (block.isBlockStyle) {
    const continuation = (block.style.blockContinuation ?? ' * ').trimEnd();
    return { content: block.indentation + continuation + ' ', blank: block.indentation + continuation };
  }
  return {
    content: block.indentation + block.style.lineMarker + ' ',
    blank: block.indentation + block.style.lineMarker,
  };
}

function isBlockLevel(node: XmlNode): node is XmlElementNode {
  return node.kind === 'element' && (node.elementKind === 'block' || node.elementKind === 'code');
}

/**
 * Reformats documentation comment blocks to a maximum line length.
 * Only whitespace and line breaks change; `code` content is copied as written.
 */
export class ReflowEngine {
  private config: ReflowConfig;
  private logger: Logger;

  /**
   * @throws CommentKitError (INVALID_CONFIG) for settings outside their range
   */
  constructor(config: Partial<ReflowConfig> = {}, logger?: Logger) {
    this.config = createReflowConfig(config);
    if (logger) this.logger = logger.clone();
    else this.logger = new ConsoleLogger();
    this.logger.setContext('reflow');
  }

  /**
   * Replacement text for the block's lines, joined with `\n`,
   * or null when the block already has this layout.
   */
  reflow(block: CommentBlock): string | null {
    const prefix = linePrefixOf(block);
    const body: OutputLine[] = [];
    this.layoutFlow(parseBlock(block), body, prefix.content.length);
    if (!body.some((line) => line.kind === 'text')) {
      this.logger.debug(`lines ${block.startLine}-${block.endLine}: no content to reflow`);
      return null;
    }

    const rendered = body.map((line) => (line.kind === 'blank' ? prefix.blank : prefix.content + line.text));
    const output = block.isBlockStyle
      ? [
          block.indentation + (block.style.blockOpen ?? '/**'),
          ...rendered,
          block.indentation + ' ' + (block.style.blockClose ?? '*/') + codeAfterClose(block),
        ]
      : rendered;

    if (sameModuloTrailingWhitespace(output, block.rawLines)) {
      this.logger.debug(`lines ${block.startLine}-${block.endLine}: already formatted`);
      return null;
    }
    this.logger.debug(
      `lines ${block.startLine}-${block.endLine}: reflowed into ${output.length} line(s)`
    );
    return output.join('\n');
  }

  /** Lay out a sequence of siblings: inline runs become wrapped paragraphs. */
  private layoutFlow(nodes: readonly XmlNode[], out: OutputLine[], prefixLength: number): void {
    let run: XmlNode[] = [];
    const flushRun = (): void => {
      for (const text of wrapTokens(tokenizeRun(run), this.config.maxLineLength - prefixLength)) {
        out.push({ kind: 'text', text });
      }
      run = [];
    };

    for (const node of nodes) {
      if (node.kind === 'blank') {
        flushRun();
        if (this.config.preserveBlankLines) out.push({ kind: 'blank' });
      } else if (isBlockLevel(node)) {
        flushRun();
        this.layoutElement(node, out, prefixLength);
      } else {
        run.push(node);
      }
    }
    flushRun();
  }

  private layoutElement(element: XmlElementNode, out: OutputLine[], prefixLength: number): void {
    const openTag = collapseWhitespace(element.openTag);
    if (element.selfClosing) {
      out.push({ kind: 'text', text: openTag });
      return;
    }
    const closeTag = collapseWhitespace(element.closeTag);

    if (element.elementKind === 'code') {
      const lines = element.rawContent.split('\n');
      if (lines.length > 0 && lines[0].trim() === '') lines.shift();
      if (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
      out.push({ kind: 'text', text: openTag });
      for (const line of lines) {
        out.push(line.trim() === '' ? { kind: 'blank' } : { kind: 'text', text: line.trimEnd() });
      }
      out.push({ kind: 'text', text: closeTag });
      return;
    }

    if (this.config.useCompactStyle && this.fitsCompact(element)) {
      const single = openTag + tokenizeRun(element.children).join(' ') + closeTag;
      if (prefixLength + single.length <= this.config.maxLineLength) {
        out.push({ kind: 'text', text: single });
        return;
      }
    }

    out.push({ kind: 'text', text: openTag });
    this.layoutFlow(element.children, out, prefixLength);
    out.push({ kind: 'text', text: closeTag });
  }

  private fitsCompact(element: XmlElementNode): boolean {
    return element.children.every(
      (child) => !isBlockLevel(child) && !(child.kind === 'blank' && this.config.preserveBlankLines)
    );
  }
}

/** Source text following the closing delimiter on the block's last line, e.g. ` int x;`. */
function codeAfterClose(block: CommentBlock): string {
  const open = block.style.blockOpen ?? '/**';
  const close = block.style.blockClose ?? '*/';
  const last = block.rawLines[block.rawLines.length - 1];
  const from = block.rawLines.length === 1 ? last.indexOf(open) + open.length : 0;
  const closeIndex = last.indexOf(close, from);
  if (closeIndex < 0) return '';
  const tail = last.slice(closeIndex + close.length).trimEnd();
  return tail.trim() === '' ? '' : tail;
}

function sameModuloTrailingWhitespace(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, i) => line.trimEnd() === b[i].trimEnd());
}

/** One-shot form of {@link ReflowEngine.reflow}. */
export function reflowBlock(block: CommentBlock, config: Partial<ReflowConfig> = {}): string | null {
  return new ReflowEngine(config).reflow(block);
}
