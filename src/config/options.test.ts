/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { createReflowConfig, createTagOptions } from './options';
import { CommentKitError, ErrorCode } from '../common/errors';

describe('createReflowConfig', () => {
  it('fills in defaults', () => {
    expect(createReflowConfig()).toEqual({
      maxLineLength: 120,
      useCompactStyle: true,
      preserveBlankLines: true,
    });
  });

  it('returns a frozen object', () => {
    const config = createReflowConfig({ maxLineLength: 80 });
    expect(config.maxLineLength).toBe(80);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects a non-positive max line length', () => {
    expect(() => createReflowConfig({ maxLineLength: 0 })).toThrow(CommentKitError);
    try {
      createReflowConfig({ maxLineLength: -5 });
    } catch (err) {
      expect(err).toBeInstanceOf(CommentKitError);
      if (err instanceof CommentKitError) {
        expect(err.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(err.details).toHaveLength(1);
        expect(err.details[0].startsWith('maxLineLength: ')).toBe(true);
      }
    }
  });

  it('rejects fractional lengths and unknown keys', () => {
    expect(() => createReflowConfig({ maxLineLength: 80.5 })).toThrow(CommentKitError);
    expect(() => createReflowConfig({ wrap: true })).toThrow(CommentKitError);
  });
});

describe('createTagOptions', () => {
  it('defaults to the built-in tags and no custom tags', () => {
    const options = createTagOptions();
    expect(options.knownTags).toEqual(['TODO', 'HACK', 'NOTE', 'BUG', 'FIXME', 'UNDONE', 'REVIEW', 'ANCHOR']);
    expect(options.customTags).toEqual([]);
  });

  it('parses the comma-separated custom tag setting', () => {
    const options = createTagOptions({ customTags: ' PERF, SECURITY,,perf ' });
    expect(options.customTags).toEqual(['PERF', 'SECURITY']);
  });

  it('accepts custom tags as a list', () => {
    expect(createTagOptions({ customTags: ['DEPRECATED'] }).customTags).toEqual(['DEPRECATED']);
  });

  it('rejects tag names that cannot form a word', () => {
    expect(() => createTagOptions({ knownTags: ['TO DO'] })).toThrow(CommentKitError);
  });
});
