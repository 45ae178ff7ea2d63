/**
 * Server configuration loaded from environment variables.
 *
 * @module server/config
 */

import { z } from 'zod';
import type { DocumentType, DocumentTypeConfig, ServerConfig } from './types.js';

export const DOCUMENT_TYPES = ['abstracts', 'manuscripts'] as const satisfies readonly DocumentType[];

/** Overlap sizes the remote chunker has been run with */
export const ALLOWED_OVERLAP_TOKENS = [10, 50, 100] as const;

export const DEFAULT_CHUNKING = {
  maxTokensPerChunk: 512,
  maxOverlapTokens: 50,
} as const;

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  FILE_SEARCH_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  ABSTRACTS_STORE_NAME: z.string().min(1).default('abstracts_store'),
  MANUSCRIPTS_STORE_NAME: z.string().min(1).default('manuscripts_store'),
  CHUNK_MAX_TOKENS: intFromEnv(DEFAULT_CHUNKING.maxTokensPerChunk),
  CHUNK_OVERLAP_TOKENS: z.coerce
    .number()
    .int()
    .refine((v) => ALLOWED_OVERLAP_TOKENS.some((allowed) => allowed === v), {
      message: `CHUNK_OVERLAP_TOKENS must be one of ${ALLOWED_OVERLAP_TOKENS.join(', ')}`,
    })
    .default(DEFAULT_CHUNKING.maxOverlapTokens),
  OPERATION_POLL_INTERVAL_MS: intFromEnv(1000),
  OPERATION_TIMEOUT_MS: intFromEnv(600_000),
  NEO4J_URI: z.string().optional(),
  NEO4J_USERNAME: z.string().optional(),
  NEO4J_PASSWORD: z.string().optional(),
  NEO4J_DATABASE: z.string().optional(),
});

/**
 * Treat empty strings in the environment as unset so defaults apply
 */
function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      out[key] = value.trim();
    }
  }
  return out;
}

/**
 * Build the server configuration from an environment map.
 *
 * @throws ZodError when a variable is present but malformed
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.parse(compactEnv(env));

  const documentTypes: Record<DocumentType, DocumentTypeConfig> = {
    abstracts: {
      storeName: parsed.ABSTRACTS_STORE_NAME,
      schema: 'legacy',
      dedup: false,
      extension: 'pdf',
    },
    manuscripts: {
      storeName: parsed.MANUSCRIPTS_STORE_NAME,
      schema: 'current',
      dedup: true,
      extension: 'pdf',
    },
  };

  const neo4j =
    parsed.NEO4J_URI && parsed.NEO4J_USERNAME && parsed.NEO4J_PASSWORD
      ? {
          uri: parsed.NEO4J_URI,
          username: parsed.NEO4J_USERNAME,
          password: parsed.NEO4J_PASSWORD,
          database: parsed.NEO4J_DATABASE,
        }
      : null;

  return {
    fileSearchModel: parsed.FILE_SEARCH_MODEL,
    documentTypes,
    chunking: {
      maxTokensPerChunk: parsed.CHUNK_MAX_TOKENS,
      maxOverlapTokens: parsed.CHUNK_OVERLAP_TOKENS,
    },
    pollIntervalMs: parsed.OPERATION_POLL_INTERVAL_MS,
    operationTimeoutMs: parsed.OPERATION_TIMEOUT_MS,
    neo4j,
  };
}

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((t) => t === value);
}
