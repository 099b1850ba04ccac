/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { XMLParser } from 'fast-xml-parser';
import { exportTags, formatFromExtension } from './tag-exporter';
import type { TagItem } from '../tags/types';

const items: TagItem[] = [
  {
    tagName: 'TODO',
    message: 'split this, then "rename"',
    filePath: 'src/ui/Widget.cs',
    fileName: 'Widget.cs',
    lineNumber: 3,
    column: 7,
    project: 'Demo',
    owner: 'ana',
    issue: 7,
    dueDate: '2026-03-01',
  },
  {
    tagName: 'ANCHOR',
    message: 'a | b',
    filePath: 'src/ui/Widget.cs',
    fileName: 'Widget.cs',
    lineNumber: 6,
    column: 11,
    anchorId: 'render-path',
  },
];

const exportedAt = new Date(Date.UTC(2026, 0, 15, 8, 30, 0));

describe('exportTags', () => {
  it('writes tab-separated values', () => {
    expect(exportTags(items, 'tsv')).toBe(
      'Type\tMessage\tFile\tPath\tLine\tProject\tOwner\tIssue\tDue\tAnchor ID\n' +
        'TODO\tsplit this, then "rename"\tWidget.cs\tsrc/ui/Widget.cs\t3\tDemo\tana\t#7\t2026-03-01\t\n' +
        'ANCHOR\ta | b\tWidget.cs\tsrc/ui/Widget.cs\t6\t\t\t\t\trender-path\n'
    );
  });

  it('quotes csv fields that need it', () => {
    const lines = exportTags(items, 'csv').split('\n');
    expect(lines[0]).toBe('Type,Message,File,Path,Line,Project,Owner,Issue,Due,Anchor ID');
    expect(lines[1]).toBe('TODO,"split this, then ""rename""",Widget.cs,src/ui/Widget.cs,3,Demo,ana,#7,2026-03-01,');
    expect(lines[2]).toBe('ANCHOR,a | b,Widget.cs,src/ui/Widget.cs,6,,,,,render-path');
  });

  it('writes a markdown table', () => {
    const lines = exportTags(items, 'markdown').split('\n');
    expect(lines[0]).toBe('# Code Tags');
    expect(lines[2]).toBe('| Type | Message | File | Path | Line | Project | Owner | Issue | Due | Anchor ID |');
    expect(lines[3]).toBe('|------|------|------|------|------|------|------|------|------|------|');
    expect(lines[5]).toBe('| ANCHOR | a \\| b | Widget.cs | src/ui/Widget.cs | 6 |  |  |  |  | render-path |');
    expect(lines[7]).toBe('*2 tags*');
  });

  it('writes json with nulls for missing fields', () => {
    const parsed: unknown = JSON.parse(exportTags(items, 'json', { exportedAt }));
    expect(parsed).toEqual({
      exportedAt: '2026-01-15T08:30:00.000Z',
      count: 2,
      tags: [
        {
          type: 'TODO',
          message: 'split this, then "rename"',
          file: 'Widget.cs',
          path: 'src/ui/Widget.cs',
          line: 3,
          project: 'Demo',
          owner: 'ana',
          issue: '#7',
          due: '2026-03-01',
          anchorId: null,
        },
        {
          type: 'ANCHOR',
          message: 'a | b',
          file: 'Widget.cs',
          path: 'src/ui/Widget.cs',
          line: 6,
          project: null,
          owner: null,
          issue: null,
          due: null,
          anchorId: 'render-path',
        },
      ],
    });
  });

  it('writes xml that reads back', () => {
    const xml = exportTags(items, 'xml', { exportedAt });
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<tags')).toBe(true);
    const parser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: '@_', parseTagValue: false, parseAttributeValue: false });
    const doc: unknown = parser.parse(xml);
    expect(doc).toMatchObject({
      tags: {
        '@_exportedAt': '2026-01-15T08:30:00.000Z',
        '@_count': '2',
        tag: [
          {
            '@_type': 'TODO',
            '@_line': '3',
            message: 'split this, then "rename"',
            file: 'Widget.cs',
            owner: 'ana',
            issue: '#7',
            due: '2026-03-01',
          },
          { '@_type': 'ANCHOR', '@_line': '6', message: 'a | b', anchorId: 'render-path' },
        ],
      },
    });
  });

  it('writes only the header for no items', () => {
    expect(exportTags([], 'csv')).toBe('Type,Message,File,Path,Line,Project,Owner,Issue,Due,Anchor ID\n');
  });
});

describe('formatFromExtension', () => {
  it('maps extensions and falls back to tsv', () => {
    expect(formatFromExtension('.CSV')).toBe('csv');
    expect(formatFromExtension('md')).toBe('markdown');
    expect(formatFromExtension('.json')).toBe('json');
    expect(formatFromExtension('.xml')).toBe('xml');
    expect(formatFromExtension('.txt')).toBe('tsv');
  });
});
