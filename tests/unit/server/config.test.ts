/**
 * Unit tests for server configuration
 */

import { describe, it, expect } from 'vitest';
import { loadServerConfig, isDocumentType, DOCUMENT_TYPES } from '../../../src/server/config.js';

describe('loadServerConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadServerConfig({});

    expect(config).toEqual({
      fileSearchModel: 'gemini-2.5-flash',
      documentTypes: {
        abstracts: { storeName: 'abstracts_store', schema: 'legacy', dedup: false, extension: 'pdf' },
        manuscripts: { storeName: 'manuscripts_store', schema: 'current', dedup: true, extension: 'pdf' },
      },
      chunking: { maxTokensPerChunk: 512, maxOverlapTokens: 50 },
      pollIntervalMs: 1000,
      operationTimeoutMs: 600000,
      neo4j: null,
    });
  });

  it('should read overrides and treat blank values as unset', () => {
    const config = loadServerConfig({
      ABSTRACTS_STORE_NAME: 'abstracts_v2',
      MANUSCRIPTS_STORE_NAME: '   ',
      CHUNK_MAX_TOKENS: '256',
      CHUNK_OVERLAP_TOKENS: '100',
      OPERATION_TIMEOUT_MS: '0',
    });

    expect(config.documentTypes.abstracts.storeName).toBe('abstracts_v2');
    expect(config.documentTypes.manuscripts.storeName).toBe('manuscripts_store');
    expect(config.chunking).toEqual({ maxTokensPerChunk: 256, maxOverlapTokens: 100 });
    expect(config.operationTimeoutMs).toBe(0);
  });

  it('should reject an overlap the remote chunker does not use', () => {
    expect(() => loadServerConfig({ CHUNK_OVERLAP_TOKENS: '25' })).toThrow(
      'CHUNK_OVERLAP_TOKENS must be one of 10, 50, 100'
    );
  });

  it('should configure Neo4j only when all three credentials are set', () => {
    expect(loadServerConfig({ NEO4J_URI: 'bolt://localhost:7687', NEO4J_USERNAME: 'neo4j' }).neo4j).toBeNull();

    expect(
      loadServerConfig({
        NEO4J_URI: 'bolt://localhost:7687',
        NEO4J_USERNAME: 'neo4j',
        NEO4J_PASSWORD: 'test-secret',
      }).neo4j
    ).toEqual({ uri: 'bolt://localhost:7687', username: 'neo4j', password: 'test-secret', database: undefined });
  });
});

describe('isDocumentType', () => {
  it('should accept only the known types', () => {
    expect(DOCUMENT_TYPES).toEqual(['abstracts', 'manuscripts']);
    expect(isDocumentType('manuscripts')).toBe(true);
    expect(isDocumentType('letters')).toBe(false);
  });
});
