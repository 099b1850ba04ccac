/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type { Logger, LogLevel } from './common/logger';
export { LOG_LEVELS } from './common/logger';
export { ConsoleLogger } from './common/console-logger';
export { CommentKitError, ErrorCode, invalidConfig, invalidArgument } from './common/errors';
export type { CommentKitErrorOptions } from './common/errors';
export { splitPathPrefix, splitPathSegments, fileNameOf, isPathLike, hasFileExtension } from './common/path-utils';
export type { PathRoot, PathPrefixSplit } from './common/path-utils';

export * from './config';

export {
  CSHARP_STYLE,
  VISUAL_BASIC_STYLE,
  CPP_STYLE,
  FSHARP_STYLE,
  TYPESCRIPT_STYLE,
  JAVASCRIPT_STYLE,
  COMMENT_STYLES,
  getStyleForContentType,
  supportsBlockDoc,
  isCommentLine,
} from './styles/comment-styles';
export type { CommentStyle } from './styles/comment-styles';

export { createTextSnapshot, lineAt, offsetOf, lineRangeSpan } from './text/text-snapshot';
export type { TextSnapshot, TextSpan } from './text/text-snapshot';

export * from './scanner';
export * from './parser';
export * from './reflow';
export * from './links';
export * from './tags';
export * from './export';
