/**
 * DedupIndex - keys of the documents already present in a store.
 *
 * One full listing per call; bulk runs call it once up front.
 *
 * @module services/ingestion/dedup-index
 */

import { dedupKeyOf, toDocumentRecord, type DocumentRecord } from '../file-search/metadata.js';
import type { FileSearchService, Store } from '../file-search/types.js';

export class DedupIndex {
  constructor(private readonly service: FileSearchService) {}

  async records(store: Store): Promise<DocumentRecord[]> {
    const records: DocumentRecord[] = [];
    for await (const remote of this.service.listDocuments(store.name)) {
      records.push(toDocumentRecord(remote));
    }
    return records;
  }

  /**
   * Dedup keys of every record. Records written by neither metadata layout
   * contribute nothing.
   */
  async existingKeys(store: Store): Promise<Set<string>> {
    const keys = new Set<string>();
    for (const record of await this.records(store)) {
      const key = dedupKeyOf(record.metadata);
      if (key !== null) keys.add(key);
    }
    console.error(`[DedupIndex] ${keys.size} existing document key(s) in ${store.name}`);
    return keys;
  }
}
