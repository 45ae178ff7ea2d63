/**
 * IngestionPipeline - one document into one remote store.
 *
 * upload() submits the file with the configured chunking policy and polls the
 * returned operation until it is done. An error at the operation level or
 * nested under its result fails that document. Nothing is cleaned up remotely
 * after a failure; partially ingested chunks stay in the store.
 *
 * @module services/ingestion/pipeline
 */

import * as path from 'path';
import type { DocumentType, ServerConfig } from '../../server/types.js';
import { validationError } from '../../server/errors.js';
import { assertFile, getFileExtension } from '../../utils/files.js';
import {
  buildMetadata,
  displayNameOf,
  encodeMetadata,
  type DocumentMetadata,
  type MetadataFields,
} from '../file-search/metadata.js';
import { pollOperation } from '../file-search/operation.js';
import type { StoreRegistry } from '../file-search/store-registry.js';
import type { FileSearchService, Store, UploadOperation } from '../file-search/types.js';
import {
  InferredMetadataExtractor,
  ManualMetadataExtractor,
  type ExtractedMetadata,
  type ManualMetadataInput,
  type MetadataExtractor,
} from './metadata-extractor.js';

export type PipelineConfig = Pick<
  ServerConfig,
  'documentTypes' | 'chunking' | 'pollIntervalMs' | 'operationTimeoutMs'
>;

export interface UploadOptions {
  signal?: AbortSignal;
  /** Overrides the configured operation timeout; 0 waits forever */
  timeoutMs?: number;
}

export type MetadataMode = 'auto' | 'manual';

export interface IngestDocumentRequest {
  filePath: string;
  documentType: DocumentType;
  metadataMode: MetadataMode;
  /** Caller-supplied values; `title` is mandatory in manual mode */
  fields?: MetadataFields;
  signal?: AbortSignal;
}

export interface IngestDocumentResult {
  store: Store;
  metadata: DocumentMetadata;
  extracted: ExtractedMetadata;
  operation: UploadOperation;
}

export interface IngestionPipelineDeps {
  service: FileSearchService;
  registry: StoreRegistry;
  config: PipelineConfig;
  /** Used in auto mode; created on first use when omitted */
  inferredExtractor?: MetadataExtractor;
}

export class IngestionPipeline {
  private readonly service: FileSearchService;
  private readonly registry: StoreRegistry;
  private readonly config: PipelineConfig;
  private inferredExtractor: MetadataExtractor | undefined;

  constructor(deps: IngestionPipelineDeps) {
    this.service = deps.service;
    this.registry = deps.registry;
    this.config = deps.config;
    this.inferredExtractor = deps.inferredExtractor;
  }

  /**
   * Upload one file and wait for the remote ingestion job.
   *
   * @throws MCPError VALIDATION_ERROR before any remote call when the
   *   schema's mandatory field is blank
   * @throws MCPError OPERATION_FAILED / OPERATION_TIMEOUT / OPERATION_CANCELLED
   */
  async upload(
    store: Store,
    filePath: string,
    metadata: DocumentMetadata,
    options: UploadOptions = {}
  ): Promise<UploadOperation> {
    const customMetadata = encodeMetadata(metadata);
    const displayName = displayNameOf(metadata);

    console.error(`[IngestionPipeline] Uploading ${path.basename(filePath)} to ${store.name} as "${displayName}"`);
    const initial = await this.service.uploadDocument({
      storeName: store.name,
      filePath,
      displayName,
      chunking: this.config.chunking,
      customMetadata,
    });

    const operation = await pollOperation(this.service, initial, {
      intervalMs: this.config.pollIntervalMs,
      timeoutMs: options.timeoutMs ?? this.config.operationTimeoutMs,
      signal: options.signal,
      context: { filePath },
    });
    console.error(`[IngestionPipeline] Upload complete: ${operation.name}`);
    return operation;
  }

  /**
   * Title and id for a document: from the caller when `manual` is given,
   * otherwise inferred with a filename fallback
   */
  async extractMetadata(filePath: string, fileName: string, manual?: ManualMetadataInput): Promise<ExtractedMetadata> {
    const extractor = manual ? new ManualMetadataExtractor(manual) : this.getInferredExtractor();
    return extractor.extract(filePath, fileName);
  }

  /**
   * Single-document flow: validate, resolve metadata, resolve store, upload
   */
  async ingestDocument(request: IngestDocumentRequest): Promise<IngestDocumentResult> {
    const { filePath, documentType, metadataMode, fields = {} } = request;
    const typeConfig = this.config.documentTypes[documentType];
    const fileName = path.basename(filePath);

    await assertFile(filePath);
    if (getFileExtension(fileName) !== typeConfig.extension) {
      throw validationError(`Expected a .${typeConfig.extension} file for ${documentType}: ${fileName}`, {
        filePath,
        documentType,
      });
    }

    let manual: ManualMetadataInput | undefined;
    if (metadataMode === 'manual') {
      manual = { title: fields.title ?? '', id: fields.id };
    }
    let extracted = await this.extractMetadata(filePath, fileName, manual);
    // Caller values outrank inferred ones
    if (metadataMode === 'auto') {
      extracted = {
        ...extracted,
        title: fields.title?.trim() || extracted.title,
        id: fields.id?.trim() || extracted.id,
      };
    }
    const metadata = buildMetadata(typeConfig.schema, fileName, {
      ...fields,
      title: extracted.title,
      id: extracted.id,
    });

    const store = await this.registry.resolve(typeConfig.storeName);
    const operation = await this.upload(store, filePath, metadata, { signal: request.signal });
    return { store, metadata, extracted, operation };
  }

  private getInferredExtractor(): MetadataExtractor {
    if (!this.inferredExtractor) {
      this.inferredExtractor = new InferredMetadataExtractor();
    }
    return this.inferredExtractor;
  }
}
