/**
 * File search store boundary types.
 *
 * The remote indexing service is consumed through the FileSearchService
 * interface so the pipeline can run against a fake in tests.
 *
 * @module services/file-search/types
 */

import type { ChunkingConfig } from '../../server/types.js';

/**
 * A named remote document collection
 */
export interface Store {
  /** Opaque remote identifier, e.g. fileSearchStores/abc123 */
  name: string;
  /** Caller-chosen label used for idempotent lookup */
  displayName: string;
}

export interface CustomMetadataEntry {
  key: string;
  stringValue: string;
}

export interface OperationErrorInfo {
  code?: number;
  message: string;
  details?: unknown[];
}

/**
 * Snapshot of an asynchronous remote ingestion job.
 * `error` and `result.error` are both reported by the service; either one means
 * the document was not ingested.
 */
export interface UploadOperation {
  name: string;
  done: boolean;
  error?: OperationErrorInfo;
  result?: {
    error?: OperationErrorInfo;
    documentName?: string;
  };
}

/**
 * A document as listed by the remote store, before metadata decoding
 */
export interface RemoteDocument {
  name: string;
  displayName: string;
  customMetadata: CustomMetadataEntry[];
}

export interface UploadRequest {
  storeName: string;
  filePath: string;
  displayName: string;
  chunking: ChunkingConfig;
  customMetadata: CustomMetadataEntry[];
}

export interface SearchAnswer {
  text: string;
  citations: string[];
}

export interface FileSearchService {
  listStores(): Promise<Store[]>;
  createStore(displayName: string): Promise<Store>;
  uploadDocument(request: UploadRequest): Promise<UploadOperation>;
  /** Re-fetch an operation by the name returned from uploadDocument */
  getOperation(operationName: string): Promise<UploadOperation>;
  /** Forget an operation that will not be polled again */
  releaseOperation(operationName: string): void;
  /** Pages through every document of a store */
  listDocuments(storeName: string): AsyncIterable<RemoteDocument>;
  /** Deletes a document and its chunks */
  deleteDocument(documentName: string): Promise<void>;
  query(storeName: string, question: string): Promise<SearchAnswer>;
}
