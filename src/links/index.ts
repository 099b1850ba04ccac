/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parseLinks, findLinkAt, containsLinkAnchor } from './link-anchor-parser';
export type { LinkAnchorInfo } from './types';
