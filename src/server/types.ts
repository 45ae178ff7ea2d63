/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { ErrorCategory } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error structure for failed tool operations
 */
export interface ToolError {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Successful tool result
 */
export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Failed tool result
 */
export interface ToolResultFailure {
  success: false;
  error: ToolError;
}

export type ToolResult<T = unknown> = ToolResultSuccess<T> | ToolResultFailure;

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

export function failureResult(
  category: ErrorCategory,
  message: string,
  details?: Record<string, unknown>
): ToolResultFailure {
  return {
    success: false,
    error: { category, message, details },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Logical document collections. Each maps onto one remote file search store.
 */
export type DocumentType = 'abstracts' | 'manuscripts';

/**
 * Custom-metadata layout written alongside a document
 */
export type MetadataSchemaVersion = 'legacy' | 'current';

export interface DocumentTypeConfig {
  /** displayName used to find or create the remote store */
  storeName: string;
  schema: MetadataSchemaVersion;
  /** Skip files whose dedup key already exists in the store */
  dedup: boolean;
  /** File extension accepted during folder ingestion, without the dot */
  extension: string;
}

/**
 * Whitespace chunking applied by the remote store at upload time
 */
export interface ChunkingConfig {
  maxTokensPerChunk: number;
  maxOverlapTokens: number;
}

export interface Neo4jConnectionConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
}

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Model used for grounded file search queries */
  fileSearchModel: string;

  /** Logical document type to remote store mapping */
  documentTypes: Record<DocumentType, DocumentTypeConfig>;

  /** Chunking policy sent with every upload */
  chunking: ChunkingConfig;

  /** Fixed delay between operation re-fetches */
  pollIntervalMs: number;

  /** Abort polling after this long; 0 waits forever */
  operationTimeoutMs: number;

  /** Graph database connection, absent when not configured */
  neo4j: Neo4jConnectionConfig | null;
}
