/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { XMLBuilder } from 'fast-xml-parser';
import { invalidArgument } from '../common/errors';
import type { TagItem } from '../tags/types';

export type ExportFormat = 'tsv' | 'csv' | 'markdown' | 'json' | 'xml';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['tsv', 'csv', 'markdown', 'json', 'xml'];

export interface ExportOptions {
  /** Timestamp written by the json and xml formats; defaults to now. */
  exportedAt?: Date;
}

const HEADERS = ['Type', 'Message', 'File', 'Path', 'Line', 'Project', 'Owner', 'Issue', 'Due', 'Anchor ID'];

function issueText(issue: number | undefined): string {
  return issue === undefined ? '' : `#${issue}`;
}

function rowValues(item: TagItem): string[] {
  return [
    item.tagName,
    item.message,
    item.fileName,
    item.filePath,
    String(item.lineNumber),
    item.project ?? '',
    item.owner ?? '',
    issueText(item.issue),
    item.dueDate ?? '',
    item.anchorId ?? '',
  ];
}

function escapeCsvField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

function escapeMarkdownCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n|\r/g, ' ');
}

function exportTsv(items: readonly TagItem[]): string {
  const rows = items.map((item) => rowValues(item).map((v) => v.replace(/[\t\r\n]+/g, ' ')));
  return [HEADERS, ...rows].map((row) => row.join('\t') + '\n').join('');
}

function exportCsv(items: readonly TagItem[]): string {
  const rows = items.map((item) => rowValues(item).map(escapeCsvField));
  return [HEADERS, ...rows].map((row) => row.join(',') + '\n').join('');
}

function exportMarkdown(items: readonly TagItem[]): string {
  const lines = [
    '# Code Tags',
    '',
    `| ${HEADERS.join(' | ')} |`,
    `|${HEADERS.map(() => '------').join('|')}|`,
    ...items.map((item) => `| ${rowValues(item).map(escapeMarkdownCell).join(' | ')} |`),
    '',
    `*${items.length} tag${items.length === 1 ? '' : 's'}*`,
  ];
  return lines.join('\n') + '\n';
}

function exportJson(items: readonly TagItem[], exportedAt: Date): string {
  const document = {
    exportedAt: exportedAt.toISOString(),
    count: items.length,
    tags: items.map((item) => ({
      type: item.tagName,
      message: item.message,
      file: item.fileName,
      path: item.filePath,
      line: item.lineNumber,
      project: item.project ?? null,
      owner: item.owner ?? null,
      issue: item.issue === undefined ? null : issueText(item.issue),
      due: item.dueDate ?? null,
      anchorId: item.anchorId ?? null,
    })),
  };
  return JSON.stringify(document, null, 2) + '\n';
}

function exportXml(items: readonly TagItem[], exportedAt: Date): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });
  const optional = (name: string, value: string | undefined): Record<string, string> =>
    value ? { [name]: value } : {};
  const document = {
    tags: {
      '@_exportedAt': exportedAt.toISOString(),
      '@_count': String(items.length),
      tag: items.map((item) => ({
        '@_type': item.tagName,
        '@_line': String(item.lineNumber),
        message: item.message,
        file: item.fileName,
        path: item.filePath,
        ...optional('project', item.project),
        ...optional('owner', item.owner),
        ...optional('issue', issueText(item.issue)),
        ...optional('due', item.dueDate),
        ...optional('anchorId', item.anchorId),
      })),
    },
  };
  return '<?xml version="1.0" encoding="UTF-8"?>\n' + builder.build(document);
}

/**
 * Render tag items for saving or sharing. Every format starts with a header
 * (or carries field names) and ends with a newline.
 */
export function exportTags(items: readonly TagItem[], format: ExportFormat, options: ExportOptions = {}): string {
  const exportedAt = options.exportedAt ?? new Date();
  switch (format) {
    case 'tsv':
      return exportTsv(items);
    case 'csv':
      return exportCsv(items);
    case 'markdown':
      return exportMarkdown(items);
    case 'json':
      return exportJson(items, exportedAt);
    case 'xml':
      return exportXml(items, exportedAt);
    default:
      throw invalidArgument(`Unknown export format: ${String(format)}`);
  }
}

/** Format for a file extension such as ".md"; tab-separated values for anything unknown. */
export function formatFromExtension(extension: string): ExportFormat {
  switch (extension.toLowerCase().replace(/^\./, '')) {
    case 'csv':
      return 'csv';
    case 'md':
    case 'markdown':
      return 'markdown';
    case 'json':
      return 'json';
    case 'xml':
      return 'xml';
    default:
      return 'tsv';
  }
}
