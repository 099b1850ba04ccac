/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger } from './console-logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('warn');
    logger.setContext('tags');
    logger.debug('hidden');
    logger.warn('shown', 3);
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[tags]', 'shown', 3);
  });

  it('clones keep the level but not the context', () => {
    const logger = new ConsoleLogger('debug');
    logger.setContext('reflow');
    const copy = logger.clone();
    expect(copy.getContext()).toBeUndefined();
    expect(copy.isEnabled('debug')).toBe(true);
    expect(copy.isEnabled('trace')).toBe(false);
  });
});
