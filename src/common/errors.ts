/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Errors raised at the configuration boundary. Parsers and tokenizers never
  throw on malformed text; they degrade to literal text or "no match".
*/

export enum ErrorCode {
  /** Configuration object failed schema validation */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** A caller passed a value outside the accepted domain */
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

export interface CommentKitErrorOptions {
  code: ErrorCode;
  message: string;
  /** One entry per violated constraint, e.g. "maxLineLength: must be >= 1". */
  details?: string[];
  cause?: unknown;
}

export class CommentKitError extends Error {
  readonly code: ErrorCode;
  readonly details: readonly string[];

  constructor(options: CommentKitErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = options.code;
    this.details = options.details ?? [];
    Object.setPrototypeOf(this, CommentKitError.prototype);
    this.name = `CommentKitError[${this.code}]`;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      details: [...this.details],
    };
  }
}

export function invalidConfig(subject: string, details: string[], cause?: unknown): CommentKitError {
  return new CommentKitError({
    code: ErrorCode.INVALID_CONFIG,
    message: `Invalid ${subject}: ${details.join('; ')}`,
    details,
    cause,
  });
}

export function invalidArgument(message: string): CommentKitError {
  return new CommentKitError({ code: ErrorCode.INVALID_ARGUMENT, message });
}
