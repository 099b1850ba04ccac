/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { isInsideStringLiteral, isValidCalendarDate, parseTagMetadata, parseTags } from './tag-parser';
import { BUILT_IN_TAGS, parseCustomTags } from './tag-list';

describe('parseTags', () => {
  it('reads owner, issue and due date', () => {
    expect(parseTags('TODO(@mads, #1234, 2026-02-01): Refactor this', BUILT_IN_TAGS)).toEqual([
      {
        tagName: 'TODO',
        spanStart: 0,
        spanLength: 31,
        rawMetadata: '@mads, #1234, 2026-02-01',
        owner: 'mads',
        issue: 1234,
        dueDate: '2026-02-01',
        message: 'Refactor this',
      },
    ]);
  });

  it('ignores an impossible due date', () => {
    const [match] = parseTags('TODO(2026-02-32): bad date', BUILT_IN_TAGS);
    expect(match.tagName).toBe('TODO');
    expect(match.dueDate).toBeUndefined();
    expect(match.message).toBe('bad date');
  });

  it('reads comment content given without an opener', () => {
    expect(parseTags('   NOTE: already stripped', BUILT_IN_TAGS)[0]).toMatchObject({ spanStart: 3, message: 'already stripped' });
    expect(parseTags('Todo says hello', BUILT_IN_TAGS)[0].tagName).toBe('TODO');
  });

  it('accepts square brackets and no colon', () => {
    const [match] = parseTags('    // HACK [@ana] work around the cache', BUILT_IN_TAGS);
    expect(match).toMatchObject({ tagName: 'HACK', owner: 'ana', spanStart: 7, message: 'work around the cache' });
  });

  it('matches case-insensitively and reports the listed spelling', () => {
    const [match] = parseTags('// todo: lower case', BUILT_IN_TAGS);
    expect(match.tagName).toBe('TODO');
    expect(match.spanLength).toBe(5);
  });

  it('finds tags after every comment opener', () => {
    expect(parseTags('/* NOTE: block */', BUILT_IN_TAGS)[0].message).toBe('block');
    expect(parseTags("' BUG: vb comment", BUILT_IN_TAGS)[0].tagName).toBe('BUG');
    expect(parseTags('   * FIXME continuation line', BUILT_IN_TAGS)[0].tagName).toBe('FIXME');
    expect(parseTags('<!-- REVIEW: markup -->', BUILT_IN_TAGS)[0].message).toBe('markup');
    expect(parseTags('/// TODO: doc comment', BUILT_IN_TAGS)[0].spanStart).toBe(4);
    expect(parseTags('x = 1; // UNDONE: trailing', BUILT_IN_TAGS)[0].spanStart).toBe(10);
  });

  it('only matches at the start of comment content', () => {
    expect(parseTags('// a straightforward bug fix', BUILT_IN_TAGS)).toEqual([]);
    expect(parseTags('var todo = 1;', BUILT_IN_TAGS)).toEqual([]);
    expect(parseTags('// TODOS are whole words only', BUILT_IN_TAGS)).toEqual([]);
  });

  it('skips openers inside string literals', () => {
    const line = 'var url = "http://example.test"; // NOTE: check';
    const matches = parseTags(line, BUILT_IN_TAGS);
    expect(matches).toHaveLength(1);
    expect(matches[0].spanStart).toBe(line.indexOf('NOTE'));
    expect(parseTags('var s = "// TODO: not a comment";', BUILT_IN_TAGS)).toEqual([]);
  });

  it('recognizes custom tags', () => {
    const [match] = parseTags('// PERF: slow path', BUILT_IN_TAGS, parseCustomTags('PERF, SECURITY'));
    expect(match.tagName).toBe('PERF');
    expect(parseTags('// PERF: slow path', BUILT_IN_TAGS)).toEqual([]);
  });

  it('turns ANCHOR metadata into an anchor id', () => {
    expect(parseTags('// ANCHOR(setup-steps): how to set up', BUILT_IN_TAGS)[0].anchorId).toBe('setup-steps');
    expect(parseTags('// ANCHOR(@ana): owned', BUILT_IN_TAGS)[0].anchorId).toBeUndefined();
  });

  it('returns nothing for an empty tag list', () => {
    expect(parseTags('// TODO: x', [])).toEqual([]);
  });
});

describe('parseTagMetadata', () => {
  it('keeps the first token of each kind', () => {
    expect(parseTagMetadata('(@a; @b #1 #2 2026-01-31 2026-03-01 misc)')).toEqual({
      owner: 'a',
      issue: 1,
      dueDate: '2026-01-31',
    });
  });

  it('skips issue numbers too large to hold exactly', () => {
    expect(parseTagMetadata('#99999999999999999999 #5')).toEqual({ issue: 5 });
    expect(parseTagMetadata('#9007199254740993')).toEqual({});
  });

  it('returns an empty object when nothing is recognized', () => {
    expect(parseTagMetadata('soon, maybe')).toEqual({});
    expect(parseTagMetadata('')).toEqual({});
  });
});

describe('isValidCalendarDate', () => {
  it('accepts real dates only', () => {
    expect(isValidCalendarDate('2024-02-29')).toBe(true);
    expect(isValidCalendarDate('2026-02-29')).toBe(false);
    expect(isValidCalendarDate('2026-13-01')).toBe(false);
    expect(isValidCalendarDate('2026-00-10')).toBe(false);
    expect(isValidCalendarDate('0099-12-31')).toBe(true);
    expect(isValidCalendarDate('2026-1-01')).toBe(false);
    expect(isValidCalendarDate('2026-01-01T00:00')).toBe(false);
  });
});

describe('isInsideStringLiteral', () => {
  it('counts quotes before the position', () => {
    const line = 'a("x // y") // z';
    expect(isInsideStringLiteral(line, line.indexOf('//'))).toBe(true);
    expect(isInsideStringLiteral(line, line.lastIndexOf('//'))).toBe(false);
  });

  it('handles escaped quotes and verbatim strings', () => {
    const escaped = 's = "a\\" //"; // c';
    expect(isInsideStringLiteral(escaped, escaped.lastIndexOf('//'))).toBe(false);
    const verbatim = 's = @"a "" //"; // c';
    expect(isInsideStringLiteral(verbatim, verbatim.indexOf('//'))).toBe(true);
    expect(isInsideStringLiteral(verbatim, verbatim.lastIndexOf('//'))).toBe(false);
  });
});
