/**
 * BulkOrchestrator - folder-scale ingestion.
 *
 * Files are processed one at a time. A failing file is recorded and the batch
 * moves on; only precondition and store resolution failures abort the batch.
 *
 * @module services/ingestion/bulk-orchestrator
 */

import * as path from 'path';
import { DOCUMENT_TYPES, isDocumentType } from '../../server/config.js';
import { errorMessage, invalidDocumentTypeError, MCPError } from '../../server/errors.js';
import type { DocumentType, DocumentTypeConfig } from '../../server/types.js';
import { assertDirectory, listFilesWithExtension } from '../../utils/files.js';
import { buildMetadata, dedupKeyOf, type MetadataFields } from '../file-search/metadata.js';
import type { StoreRegistry } from '../file-search/store-registry.js';
import type { Store } from '../file-search/types.js';
import type { DedupIndex } from './dedup-index.js';
import type { IngestionPipeline } from './pipeline.js';

export type FileStatus = 'success' | 'failed' | 'skipped';

export interface ProcessedFile {
  filename: string;
  status: FileStatus;
  /** Error message for failed files, reason for skipped ones */
  detail?: string;
}

export interface ProgressEvent {
  /** 1-based index of the file just finished */
  current: number;
  total: number;
  filename: string;
  status: FileStatus;
  error?: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;

export interface BatchResult {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  files: ProcessedFile[];
  /** "<filename>: <message>" per failed file */
  errors: string[];
}

/** Per-file metadata keyed by filename */
export type MetadataOverrides = Record<string, MetadataFields>;

export interface BulkOrchestratorDeps {
  pipeline: IngestionPipeline;
  registry: StoreRegistry;
  dedup: DedupIndex;
  documentTypes: Record<DocumentType, DocumentTypeConfig>;
  initialType?: DocumentType;
}

export class BulkOrchestrator {
  private readonly pipeline: IngestionPipeline;
  private readonly registry: StoreRegistry;
  private readonly dedup: DedupIndex;
  private readonly documentTypes: Record<DocumentType, DocumentTypeConfig>;
  private activeType: DocumentType;

  constructor(deps: BulkOrchestratorDeps) {
    this.pipeline = deps.pipeline;
    this.registry = deps.registry;
    this.dedup = deps.dedup;
    this.documentTypes = deps.documentTypes;
    this.activeType = deps.initialType ?? 'abstracts';
  }

  get activeDocumentType(): DocumentType {
    return this.activeType;
  }

  /**
   * Resolve the store for a document type and make it the active one
   *
   * @throws MCPError INVALID_DOCUMENT_TYPE / STORE_RESOLUTION_FAILED
   */
  async switchDocumentType(documentType: string): Promise<Store> {
    const type = this.requireDocumentType(documentType);
    const store = await this.registry.resolve(this.documentTypes[type].storeName);
    this.activeType = type;
    console.error(`[BulkOrchestrator] Active document type: ${type} (${store.name})`);
    return store;
  }

  /**
   * Ingest every matching file of a folder into the store for `documentType`.
   *
   * @throws MCPError INVALID_DOCUMENT_TYPE / PATH_NOT_FOUND / PATH_NOT_DIRECTORY
   *   before any remote call, STORE_RESOLUTION_FAILED after
   */
  async ingestFolder(
    folderPath: string,
    documentType: string,
    metadataOverrides: MetadataOverrides = {},
    onProgress?: ProgressCallback,
    signal?: AbortSignal
  ): Promise<BatchResult> {
    const type = this.requireDocumentType(documentType);
    const typeConfig = this.documentTypes[type];
    await assertDirectory(folderPath);

    const filenames = await listFilesWithExtension(folderPath, typeConfig.extension);
    const store = await this.registry.resolve(typeConfig.storeName);
    const existing = typeConfig.dedup ? await this.dedup.existingKeys(store) : new Set<string>();

    const total = filenames.length;
    console.error(`[BulkOrchestrator] ${total} ${typeConfig.extension} file(s) in ${folderPath} -> ${store.name}`);

    const result: BatchResult = { total, successful: 0, failed: 0, skipped: 0, files: [], errors: [] };

    for (const [index, filename] of filenames.entries()) {
      if (signal?.aborted) {
        throw new MCPError('OPERATION_CANCELLED', `Folder ingestion cancelled before ${filename}`, {
          folderPath,
          completed: index,
        });
      }
      const outcome = await this.processFile(folderPath, filename, typeConfig, store, existing, metadataOverrides, signal);

      result.files.push(outcome);
      if (outcome.status === 'success') result.successful++;
      else if (outcome.status === 'skipped') result.skipped++;
      else {
        result.failed++;
        result.errors.push(`${filename}: ${outcome.detail ?? 'Unknown error'}`);
      }

      const event: ProgressEvent = { current: index + 1, total, filename, status: outcome.status };
      if (outcome.status === 'failed' && outcome.detail !== undefined) event.error = outcome.detail;
      onProgress?.(event);
    }

    console.error(
      `[BulkOrchestrator] Done: ${result.successful} uploaded, ${result.skipped} skipped, ${result.failed} failed`
    );
    return result;
  }

  private async processFile(
    folderPath: string,
    filename: string,
    typeConfig: DocumentTypeConfig,
    store: Store,
    existing: Set<string>,
    overrides: MetadataOverrides,
    signal: AbortSignal | undefined
  ): Promise<ProcessedFile> {
    // Checked against the key the upload would write, overrides included
    const metadata = buildMetadata(typeConfig.schema, filename, overrides[filename]);
    const key = dedupKeyOf(metadata);
    if (key !== null && existing.has(key)) {
      console.error(`[BulkOrchestrator] Skipping ${filename}: "${key}" already in store`);
      return { filename, status: 'skipped', detail: 'already ingested' };
    }

    try {
      await this.pipeline.upload(store, path.join(folderPath, filename), metadata, { signal });
      return { filename, status: 'success' };
    } catch (error) {
      // Cancellation stops the batch rather than failing one file
      if (error instanceof MCPError && error.category === 'OPERATION_CANCELLED') throw error;
      const message = errorMessage(error);
      console.error(`[BulkOrchestrator] Failed ${filename}: ${message}`);
      return { filename, status: 'failed', detail: message };
    }
  }

  private requireDocumentType(documentType: string): DocumentType {
    if (!isDocumentType(documentType)) {
      throw invalidDocumentTypeError(documentType, DOCUMENT_TYPES);
    }
    return documentType;
  }
}
