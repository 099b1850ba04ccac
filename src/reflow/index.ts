/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { ReflowEngine, reflowBlock } from './reflow-engine';
export { tokenizeRun, wrapTokens, serializeInline } from './wrap';
