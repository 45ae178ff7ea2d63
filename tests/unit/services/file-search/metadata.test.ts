/**
 * Unit tests for document metadata layouts
 */

import { describe, it, expect } from 'vitest';
import {
  buildMetadata,
  decodeMetadata,
  dedupKeyOf,
  displayNameOf,
  encodeMetadata,
  fileStem,
  toDocumentRecord,
} from '../../../../src/services/file-search/index.js';
import { MCPError } from '../../../../src/server/errors.js';

describe('encodeMetadata', () => {
  it('should write legacy entries in order', () => {
    const entries = encodeMetadata({ schema: 'legacy', title: ' Gout in Bath ', id: '', fileName: '354.pdf' });

    expect(entries).toEqual([
      { key: 'title', stringValue: 'Gout in Bath' },
      { key: 'ID', stringValue: 'N/A' },
      { key: 'file_name', stringValue: '354.pdf' },
    ]);
  });

  it('should leave optional current fields out', () => {
    const entries = encodeMetadata({ schema: 'current', shortName: '355', fileName: '355.pdf' });

    expect(entries).toEqual([
      { key: 'short_name', stringValue: '355' },
      { key: 'file_name', stringValue: '355.pdf' },
    ]);
  });

  it('should write every current field when present', () => {
    const entries = encodeMetadata({
      schema: 'current',
      shortName: '355',
      abstractTitle: 'Water cures',
      abstractId: 'A-7',
      fileName: '355.pdf',
    });

    expect(entries.map((e) => e.key)).toEqual(['short_name', 'abstract_title', 'abstract_id', 'file_name']);
  });

  it('should reject a blank mandatory key', () => {
    expect(() => encodeMetadata({ schema: 'legacy', title: '  ', id: '1', fileName: 'a.pdf' })).toThrow(MCPError);
    expect(() => encodeMetadata({ schema: 'current', shortName: '', fileName: 'a.pdf' })).toThrow(
      'short_name is required for current metadata'
    );
  });
});

describe('decodeMetadata', () => {
  it('should recognise the current layout by short_name', () => {
    expect(
      decodeMetadata([
        { key: 'short_name', stringValue: '355' },
        { key: 'abstract_id', stringValue: 'A-7' },
        { key: 'file_name', stringValue: '355.pdf' },
      ])
    ).toEqual({ schema: 'current', shortName: '355', abstractId: 'A-7', fileName: '355.pdf' });
  });

  it('should recognise the legacy layout by title', () => {
    expect(decodeMetadata([{ key: 'title', stringValue: 'Gout' }])).toEqual({
      schema: 'legacy',
      title: 'Gout',
      id: 'N/A',
      fileName: '',
    });
  });

  it('should keep the first value of a repeated key', () => {
    const decoded = decodeMetadata([
      { key: 'title', stringValue: 'First' },
      { key: 'title', stringValue: 'Second' },
    ]);

    expect(decoded).toMatchObject({ schema: 'legacy', title: 'First' });
  });

  it('should report other layouts as unknown', () => {
    const entries = [{ key: 'author', stringValue: 'Smith' }];

    expect(decodeMetadata(entries)).toEqual({ schema: 'unknown', entries });
  });

  it('should decode what encodeMetadata wrote', () => {
    const metadata = { schema: 'legacy' as const, title: 'Gout', id: '354', fileName: '354.pdf' };

    expect(decodeMetadata(encodeMetadata(metadata))).toEqual(metadata);
  });
});

describe('toDocumentRecord', () => {
  it('should carry the remote name and display name', () => {
    const record = toDocumentRecord({
      name: 'fileSearchStores/s1/documents/d1',
      displayName: 'Gout',
      customMetadata: [{ key: 'title', stringValue: 'Gout' }],
    });

    expect(record.remoteId).toBe('fileSearchStores/s1/documents/d1');
    expect(record.displayName).toBe('Gout');
    expect(record.metadata.schema).toBe('legacy');
  });
});

describe('dedupKeyOf and displayNameOf', () => {
  it('should use short_name for current and title for legacy', () => {
    expect(dedupKeyOf({ schema: 'current', shortName: '355', fileName: '355.pdf' })).toBe('355');
    expect(dedupKeyOf({ schema: 'legacy', title: 'Gout', id: 'N/A', fileName: 'x.pdf' })).toBe('Gout');
    expect(dedupKeyOf({ schema: 'unknown', entries: [] })).toBeNull();
  });

  it('should trim the display name', () => {
    expect(displayNameOf({ schema: 'current', shortName: ' 355 ', fileName: '355.pdf' })).toBe('355');
  });
});

describe('buildMetadata', () => {
  it('should default the legacy title to the filename stem', () => {
    expect(buildMetadata('legacy', '354.pdf')).toEqual({
      schema: 'legacy',
      title: '354',
      id: 'N/A',
      fileName: '354.pdf',
    });
  });

  it('should map title and id onto the current abstract fields', () => {
    expect(buildMetadata('current', '355.pdf', { title: 'Water cures', id: 'A-7' })).toEqual({
      schema: 'current',
      shortName: '355',
      abstractTitle: 'Water cures',
      abstractId: 'A-7',
      fileName: '355.pdf',
    });
  });

  it('should drop a placeholder abstract id', () => {
    expect(buildMetadata('current', '355.pdf', { id: 'N/A' })).toEqual({
      schema: 'current',
      shortName: '355',
      fileName: '355.pdf',
    });
  });

  it('should prefer an explicit short name', () => {
    expect(buildMetadata('current', '355.pdf', { shortName: 'ms-355' })).toMatchObject({ shortName: 'ms-355' });
  });
});

describe('fileStem', () => {
  it('should strip only the final extension', () => {
    expect(fileStem('354.pdf')).toBe('354');
    expect(fileStem('report.v2.pdf')).toBe('report.v2');
    expect(fileStem('.hidden')).toBe('.hidden');
    expect(fileStem('README')).toBe('README');
  });
});
