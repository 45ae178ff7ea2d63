/**
 * Unit tests for IngestionPipeline against an in-memory file search service
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { IngestionPipeline } from '../../../../src/services/ingestion/pipeline.js';
import { StoreRegistry } from '../../../../src/services/file-search/store-registry.js';
import type {
  ExtractedMetadata,
  MetadataExtractor,
} from '../../../../src/services/ingestion/metadata-extractor.js';
import { FakeFileSearchService, testConfig } from '../../helpers/fakes.js';

class StubExtractor implements MetadataExtractor {
  calls: string[] = [];

  constructor(private readonly answer: ExtractedMetadata) {}

  async extract(_filePath: string, fileName: string): Promise<ExtractedMetadata> {
    this.calls.push(fileName);
    return this.answer;
  }
}

describe('IngestionPipeline', () => {
  let testDir: string;
  let service: FakeFileSearchService;
  let extractor: StubExtractor;
  let pipeline: IngestionPipeline;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docgraph-pipeline-'));
    await fs.writeFile(path.join(testDir, '354.pdf'), '%PDF-1.4 test');
    await fs.writeFile(path.join(testDir, 'notes.txt'), 'not a pdf');
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    service = new FakeFileSearchService();
    extractor = new StubExtractor({ title: 'Gout in Bath', id: '354', source: 'inferred' });
    pipeline = new IngestionPipeline({
      service,
      registry: new StoreRegistry(service),
      config: testConfig(),
      inferredExtractor: extractor,
    });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('ingestDocument', () => {
    it('should upload an abstract with legacy metadata', async () => {
      const filePath = path.join(testDir, '354.pdf');

      const result = await pipeline.ingestDocument({ filePath, documentType: 'abstracts', metadataMode: 'auto' });

      expect(extractor.calls).toEqual(['354.pdf']);
      expect(service.uploads).toEqual([
        {
          storeName: 'fileSearchStores/store-1',
          filePath,
          displayName: 'Gout in Bath',
          chunking: { maxTokensPerChunk: 512, maxOverlapTokens: 50 },
          customMetadata: [
            { key: 'title', stringValue: 'Gout in Bath' },
            { key: 'ID', stringValue: '354' },
            { key: 'file_name', stringValue: '354.pdf' },
          ],
        },
      ]);
      expect(result.store).toEqual({ name: 'fileSearchStores/store-1', displayName: 'abstracts_store' });
      expect(result.extracted.source).toBe('inferred');
      expect(result.operation).toEqual({
        name: 'operations/op-2',
        done: true,
        result: { documentName: 'fileSearchStores/store-1/documents/doc-2' },
      });
    });

    it('should upload a manuscript under its filename stem', async () => {
      const result = await pipeline.ingestDocument({
        filePath: path.join(testDir, '354.pdf'),
        documentType: 'manuscripts',
        metadataMode: 'auto',
      });

      expect(result.metadata).toEqual({
        schema: 'current',
        shortName: '354',
        abstractTitle: 'Gout in Bath',
        abstractId: '354',
        fileName: '354.pdf',
      });
      expect(service.uploads[0].displayName).toBe('354');
      expect(result.store.displayName).toBe('manuscripts_store');
    });

    it('should let caller values outrank inferred ones in auto mode', async () => {
      const result = await pipeline.ingestDocument({
        filePath: path.join(testDir, '354.pdf'),
        documentType: 'abstracts',
        metadataMode: 'auto',
        fields: { title: 'Caller title' },
      });

      expect(extractor.calls).toEqual(['354.pdf']);
      expect(result.extracted).toEqual({ title: 'Caller title', id: '354', source: 'inferred' });
      expect(service.uploads[0].customMetadata).toEqual([
        { key: 'title', stringValue: 'Caller title' },
        { key: 'ID', stringValue: '354' },
        { key: 'file_name', stringValue: '354.pdf' },
      ]);
    });

    it('should use caller values in manual mode without inference', async () => {
      const result = await pipeline.ingestDocument({
        filePath: path.join(testDir, '354.pdf'),
        documentType: 'abstracts',
        metadataMode: 'manual',
        fields: { title: 'Hand typed', id: '' },
      });

      expect(extractor.calls).toEqual([]);
      expect(result.extracted).toEqual({ title: 'Hand typed', id: 'N/A', source: 'manual' });
      expect(service.uploads[0].customMetadata[1]).toEqual({ key: 'ID', stringValue: 'N/A' });
    });

    it('should reject manual mode without a title before uploading', async () => {
      await expect(
        pipeline.ingestDocument({
          filePath: path.join(testDir, '354.pdf'),
          documentType: 'abstracts',
          metadataMode: 'manual',
        })
      ).rejects.toMatchObject({ category: 'VALIDATION_ERROR' });
      expect(service.uploads).toEqual([]);
      expect(service.listStoresCalls).toBe(0);
    });

    it('should reject a file with the wrong extension', async () => {
      await expect(
        pipeline.ingestDocument({
          filePath: path.join(testDir, 'notes.txt'),
          documentType: 'abstracts',
          metadataMode: 'auto',
        })
      ).rejects.toMatchObject({
        category: 'VALIDATION_ERROR',
        message: 'Expected a .pdf file for abstracts: notes.txt',
      });
    });

    it('should reject a missing file', async () => {
      await expect(
        pipeline.ingestDocument({
          filePath: path.join(testDir, 'absent.pdf'),
          documentType: 'abstracts',
          metadataMode: 'auto',
        })
      ).rejects.toMatchObject({ category: 'PATH_NOT_FOUND' });
    });
  });

  describe('upload', () => {
    const store = { name: 'fileSearchStores/s1', displayName: 'abstracts_store' };

    it('should poll a pending operation to completion', async () => {
      service.pendingPolls = 2;

      const operation = await pipeline.upload(store, path.join(testDir, '354.pdf'), {
        schema: 'legacy',
        title: 'Gout',
        id: 'N/A',
        fileName: '354.pdf',
      });

      expect(operation.done).toBe(true);
      expect(service.getOperationCalls).toBe(2);
    });

    it('should validate metadata before any remote call', async () => {
      await expect(
        pipeline.upload(store, path.join(testDir, '354.pdf'), {
          schema: 'current',
          shortName: ' ',
          fileName: '354.pdf',
        })
      ).rejects.toMatchObject({ category: 'VALIDATION_ERROR' });
      expect(service.uploads).toEqual([]);
    });

    it('should honour a per-call timeout', async () => {
      service.pendingPolls = 1000;

      await expect(
        pipeline.upload(
          store,
          path.join(testDir, '354.pdf'),
          { schema: 'legacy', title: 'Gout', id: 'N/A', fileName: '354.pdf' },
          { timeoutMs: 10 }
        )
      ).rejects.toMatchObject({ category: 'OPERATION_TIMEOUT' });
    });
  });
});
