/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { splitPathPrefix, splitPathSegments, fileNameOf, isPathLike } from './path-utils';

describe('path-utils', () => {
  describe('splitPathPrefix', () => {
    it('returns empty prefix for plain paths', () => {
      expect(splitPathPrefix('src/a.ts')).toEqual({ prefix: '', rest: 'src/a.ts', root: 'document' });
    });
    it('collects repeated parent prefixes', () => {
      expect(splitPathPrefix('../../shared/a.ts')).toEqual({
        prefix: '../../',
        rest: 'shared/a.ts',
        root: 'document',
      });
    });
    it('maps solution and project prefixes to their roots', () => {
      expect(splitPathPrefix('/docs/a.md').root).toBe('solution');
      expect(splitPathPrefix('~/docs/a.md')).toEqual({ prefix: '~/', rest: 'docs/a.md', root: 'solution' });
      expect(splitPathPrefix('@/lib/a.ts')).toEqual({ prefix: '@/', rest: 'lib/a.ts', root: 'project' });
    });
    it('keeps ./ as document relative', () => {
      expect(splitPathPrefix('./a.ts')).toEqual({ prefix: './', rest: 'a.ts', root: 'document' });
    });
  });

  describe('splitPathSegments', () => {
    it('splits on both separators and drops empty and dot segments', () => {
      expect(splitPathSegments('./src\\lib//a.ts')).toEqual(['src', 'lib', 'a.ts']);
    });
  });

  describe('fileNameOf', () => {
    it('returns the last segment', () => {
      expect(fileNameOf('C:\\repo\\src\\Program.cs')).toBe('Program.cs');
      expect(fileNameOf('src/app/main.ts')).toBe('main.ts');
    });
    it('returns empty string for empty path', () => {
      expect(fileNameOf('')).toBe('');
    });
  });

  describe('isPathLike', () => {
    it('accepts words with separators or extensions', () => {
      expect(isPathLike('images/Add')).toBe(true);
      expect(isPathLike('calendar.png')).toBe(true);
      expect(isPathLike('.gitignore')).toBe(true);
    });
    it('rejects prose words', () => {
      expect(isPathLike('for')).toBe(false);
      expect(isPathLike('details.')).toBe(false);
      expect(isPathLike('')).toBe(false);
    });
  });
});
