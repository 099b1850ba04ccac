/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { LOG_LEVELS } from './logger';
import type { Logger, LogLevel } from './logger';

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private level: LogLevel;

  /**
   * @param level lowest level that is written; anything below is dropped
   */
  constructor(level: LogLevel = 'info') {
    this.context = undefined;
    this.level = level;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  getContext(): string | undefined {
    return this.context;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  trace(message: string, ...attributes: unknown[]): void {
    if (!this.isEnabled('trace')) return;
    if (this.context) console.trace(`[${this.context}]`, message, ...attributes);
    else console.trace(message, ...attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (!this.isEnabled('debug')) return;
    if (this.context) console.debug(`[${this.context}]`, message, ...attributes);
    else console.debug(message, ...attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (!this.isEnabled('info')) return;
    if (this.context) console.info(`[${this.context}]`, message, ...attributes);
    else console.info(message, ...attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (!this.isEnabled('warn')) return;
    if (this.context) console.warn(`[${this.context}]`, message, ...attributes);
    else console.warn(message, ...attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (!this.isEnabled('error')) return;
    if (this.context) console.error(`[${this.context}]`, message, ...attributes);
    else console.error(message, ...attributes);
  }
}
