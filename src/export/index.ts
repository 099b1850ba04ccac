/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { exportTags, formatFromExtension, EXPORT_FORMATS } from './tag-exporter';
export type { ExportFormat, ExportOptions } from './tag-exporter';
