/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { serializeInline, tokenizeRun, wrapTokens } from './wrap';
import { parseDocXml } from '../parser/xml-doc-parser';

describe('tokenizeRun', () => {
  it('splits text on whitespace', () => {
    expect(tokenizeRun(parseDocXml('  Gets\nthe   name. '))).toEqual(['Gets', 'the', 'name.']);
  });

  it('keeps an inline element glued to adjacent punctuation', () => {
    expect(tokenizeRun(parseDocXml('Returns (<c>null</c>) when'))).toEqual(['Returns', '(<c>null</c>)', 'when']);
  });

  it('treats an inline element with spaces as one token', () => {
    expect(tokenizeRun(parseDocXml('Use <see\n   cref="Widget"/> here'))).toEqual(['Use', '<see cref="Widget"/>', 'here']);
  });

  it('breaks tokens at blank lines', () => {
    expect(tokenizeRun(parseDocXml('one\n\ntwo'))).toEqual(['one', 'two']);
  });
});

describe('serializeInline', () => {
  it('collapses whitespace inside the element', () => {
    const [node] = parseDocXml('<c>a\n   b</c>');
    if (node.kind !== 'element') throw new Error('expected an element');
    expect(serializeInline(node)).toBe('<c>a b</c>');
  });
});

describe('wrapTokens', () => {
  it('fills lines greedily', () => {
    expect(wrapTokens(['aa', 'bb', 'cc', 'dd'], 5)).toEqual(['aa bb', 'cc dd']);
  });

  it('puts an oversized token on a line of its own', () => {
    expect(wrapTokens(['a', 'abcdefghij', 'b'], 5)).toEqual(['a', 'abcdefghij', 'b']);
  });

  it('returns no lines for no tokens', () => {
    expect(wrapTokens([], 10)).toEqual([]);
  });
});
