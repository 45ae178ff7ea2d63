/**
 * Gemini File Search implementation of FileSearchService.
 *
 * Wraps `fileSearchStores`, `operations` and grounded `generateContent` of the
 * @google/genai SDK. Operation handles returned by the SDK are kept by name so
 * they can be re-fetched; callers only ever see decoded UploadOperation values.
 *
 * @module services/file-search/gemini-file-search
 */

import { GoogleGenAI, type Operation } from '@google/genai';
import { CircuitBreaker } from '../gemini/circuit-breaker.js';
import { decodeOperation } from './operation.js';
import type {
  CustomMetadataEntry,
  FileSearchService,
  RemoteDocument,
  SearchAnswer,
  Store,
  UploadOperation,
  UploadRequest,
} from './types.js';

export interface GeminiFileSearchOptions {
  apiKey?: string;
  /** Model answering grounded queries */
  queryModel: string;
}

export class GeminiFileSearchService implements FileSearchService {
  private readonly ai: GoogleGenAI;
  private readonly queryModel: string;
  private readonly circuitBreaker = new CircuitBreaker({ name: 'FileSearchService' });
  private readonly operations = new Map<string, Operation<unknown>>();

  constructor(options: GeminiFileSearchOptions) {
    const apiKey = options.apiKey ?? process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required. Set it in .env file.');
    }
    this.ai = new GoogleGenAI({ apiKey });
    this.queryModel = options.queryModel;
  }

  async listStores(): Promise<Store[]> {
    return this.circuitBreaker.execute(async () => {
      const stores: Store[] = [];
      const pager = await this.ai.fileSearchStores.list();
      for await (const store of pager) {
        if (!store.name) continue;
        stores.push({ name: store.name, displayName: store.displayName ?? '' });
      }
      return stores;
    });
  }

  async createStore(displayName: string): Promise<Store> {
    return this.circuitBreaker.execute(async () => {
      const store = await this.ai.fileSearchStores.create({ config: { displayName } });
      if (!store.name) {
        throw new Error(`Store creation for "${displayName}" returned no name`);
      }
      return { name: store.name, displayName: store.displayName ?? displayName };
    });
  }

  async uploadDocument(request: UploadRequest): Promise<UploadOperation> {
    return this.circuitBreaker.execute(async () => {
      const operation = await this.ai.fileSearchStores.uploadToFileSearchStore({
        fileSearchStoreName: request.storeName,
        file: request.filePath,
        config: {
          displayName: request.displayName,
          customMetadata: request.customMetadata.map((e) => ({ key: e.key, stringValue: e.stringValue })),
          chunkingConfig: {
            whiteSpaceConfig: {
              maxTokensPerChunk: request.chunking.maxTokensPerChunk,
              maxOverlapTokens: request.chunking.maxOverlapTokens,
            },
          },
        },
      });
      return this.remember(operation);
    });
  }

  async getOperation(operationName: string): Promise<UploadOperation> {
    const handle = this.operations.get(operationName);
    if (!handle) {
      throw new Error(`Unknown operation handle: ${operationName}`);
    }
    return this.circuitBreaker.execute(async () => {
      const refreshed = await this.ai.operations.get({ operation: handle });
      return this.remember(refreshed, operationName);
    });
  }

  releaseOperation(operationName: string): void {
    this.operations.delete(operationName);
  }

  async *listDocuments(storeName: string): AsyncIterable<RemoteDocument> {
    const pager = await this.circuitBreaker.execute(() =>
      this.ai.fileSearchStores.documents.list({ parent: storeName })
    );
    for await (const doc of pager) {
      if (!doc.name) continue;
      const customMetadata: CustomMetadataEntry[] = [];
      for (const m of doc.customMetadata ?? []) {
        if (m.key !== undefined && m.stringValue !== undefined) {
          customMetadata.push({ key: m.key, stringValue: m.stringValue });
        }
      }
      yield { name: doc.name, displayName: doc.displayName ?? '', customMetadata };
    }
  }

  async deleteDocument(documentName: string): Promise<void> {
    await this.circuitBreaker.execute(() =>
      this.ai.fileSearchStores.documents.delete({ name: documentName, config: { force: true } })
    );
  }

  async query(storeName: string, question: string): Promise<SearchAnswer> {
    const response = await this.circuitBreaker.execute(() =>
      this.ai.models.generateContent({
        model: this.queryModel,
        contents: `${question}\n(return your answer in markdown as concise bullet points)`,
        config: {
          tools: [{ fileSearch: { fileSearchStoreNames: [storeName] } }],
        },
      })
    );

    const citations: string[] = [];
    for (const chunk of response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? []) {
      const title = chunk.retrievedContext?.title ?? chunk.web?.title;
      if (title && !citations.includes(title)) citations.push(title);
    }
    return { text: response.text ?? '', citations };
  }

  /**
   * Cache the SDK handle under its name and decode it
   */
  private remember(operation: Operation<unknown>, fallbackName = ''): UploadOperation {
    const decoded = decodeOperation(operation, fallbackName);
    if (decoded.name) {
      this.operations.set(decoded.name, operation);
      if (decoded.done) this.operations.delete(decoded.name);
    }
    return decoded;
  }
}
