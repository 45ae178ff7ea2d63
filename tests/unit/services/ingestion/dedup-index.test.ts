/**
 * Unit tests for DedupIndex
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DedupIndex } from '../../../../src/services/ingestion/dedup-index.js';
import { FakeFileSearchService } from '../../helpers/fakes.js';

describe('DedupIndex', () => {
  const store = { name: 'fileSearchStores/m1', displayName: 'manuscripts_store' };
  let service: FakeFileSearchService;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    service = new FakeFileSearchService();
    service.addDocument(store.name, {
      name: `${store.name}/documents/a`,
      displayName: '354',
      customMetadata: [
        { key: 'short_name', stringValue: '354' },
        { key: 'file_name', stringValue: '354.pdf' },
      ],
    });
    service.addDocument(store.name, {
      name: `${store.name}/documents/b`,
      displayName: 'Gout',
      customMetadata: [{ key: 'title', stringValue: 'Gout' }],
    });
    service.addDocument(store.name, {
      name: `${store.name}/documents/c`,
      displayName: 'untagged',
      customMetadata: [],
    });
  });

  it('should decode every listed document', async () => {
    const records = await new DedupIndex(service).records(store);

    expect(records.map((r) => r.metadata.schema)).toEqual(['current', 'legacy', 'unknown']);
  });

  it('should collect keys of both layouts and skip unknown ones', async () => {
    const keys = await new DedupIndex(service).existingKeys(store);

    expect([...keys]).toEqual(['354', 'Gout']);
    expect(console.error).toHaveBeenCalledWith('[DedupIndex] 2 existing document key(s) in fileSearchStores/m1');
  });

  it('should return an empty set for an empty store', async () => {
    const keys = await new DedupIndex(service).existingKeys({ name: 'fileSearchStores/empty', displayName: 'x' });

    expect(keys.size).toBe(0);
  });
});
