/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import type { ElementKind } from './types';

export interface StartTag {
  name: string;
  attributes: Record<string, string>;
  selfClosing: boolean;
}

const BLOCK_TAGS = new Set([
  'summary',
  'remarks',
  'returns',
  'value',
  'param',
  'typeparam',
  'exception',
  'example',
  'permission',
  'list',
  'listheader',
  'item',
  'term',
  'description',
  'para',
  'include',
  'inheritdoc',
]);

const INLINE_TAGS = new Set(['c', 'see', 'seealso', 'paramref', 'typeparamref', 'b', 'i', 'u']);

const CODE_TAGS = new Set(['code']);

export function elementKindOf(tagName: string): ElementKind {
  const name = tagName.toLowerCase();
  if (CODE_TAGS.has(name)) return 'code';
  if (BLOCK_TAGS.has(name)) return 'block';
  if (INLINE_TAGS.has(name)) return 'inline';
  return 'generic';
}

function attributeValue(value: string | sax.QualifiedAttribute): string {
  return typeof value === 'string' ? value : value.value;
}

/**
 * Read the name and attributes of a start tag such as `<param name="id">` or `<see cref="T"/>`.
 * The markup goes through a strict sax parser; markup it rejects, such as an unquoted attribute
 * value or an unknown entity, returns undefined.
 */
export function readStartTag(markup: string): StartTag | undefined {
  if (!markup.startsWith('<') || !markup.endsWith('>')) return undefined;
  const selfClosing = /\/\s*>$/.test(markup);
  const probe = selfClosing ? markup : markup.slice(0, -1) + '/>';

  let failed = false;
  let result: StartTag | undefined;
  const parser = sax.parser(true, {});
  parser.onerror = () => {
    failed = true;
    parser.resume();
  };
  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    if (result) {
      failed = true;
      return;
    }
    const attributes: Record<string, string> = {};
    for (const name of Object.keys(tag.attributes)) {
      attributes[name] = attributeValue(tag.attributes[name]);
    }
    result = { name: tag.name, attributes, selfClosing };
  };

  try {
    parser.write(probe).close();
  } catch {
    // sax throws on input it cannot recover from; that markup is text
    return undefined;
  }
  return failed ? undefined : result;
}
