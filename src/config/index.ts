/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export {
  createReflowConfig,
  createTagOptions,
  ReflowConfigSchema,
  TagOptionsSchema,
  DEFAULT_MAX_LINE_LENGTH,
} from './options';
export type { ReflowConfig, TagOptions } from './options';
