/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export {
  findAllBlocks,
  findBlockAtPosition,
  findBlocksInRange,
  blockContentLines,
  blockContentEntries,
} from './block-scanner';
export type { ContentLine } from './block-scanner';
export type { CommentBlock } from './types';
