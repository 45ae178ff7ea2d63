/**
 * Store MCP Tools
 *
 * Tools: store_select, store_status
 *
 * @module tools/stores
 */

import { requireIngestion, hasGraphStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { DOCUMENT_TYPES } from '../server/config.js';
import { validateInput, StoreSelectInput, StoreStatusInput, DocumentTypeSchema } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleStoreSelect(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(StoreSelectInput, params);
    const { orchestrator, config } = requireIngestion();

    const store = await orchestrator.switchDocumentType(input.document_type);
    return formatResponse(
      successResult({
        document_type: input.document_type,
        store_name: store.name,
        display_name: store.displayName,
        metadata_schema: config.documentTypes[input.document_type].schema,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleStoreStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(StoreStatusInput, params);
    const { orchestrator, registry, config } = requireIngestion();

    const stores: Record<string, unknown>[] = [];
    for (const type of DOCUMENT_TYPES) {
      const typeConfig = config.documentTypes[type];
      const resolved = await registry.cached(typeConfig.storeName);
      stores.push({
        document_type: type,
        logical_name: typeConfig.storeName,
        metadata_schema: typeConfig.schema,
        dedup: typeConfig.dedup,
        store_name: resolved?.name ?? null,
      });
    }

    return formatResponse(
      successResult({
        active_document_type: orchestrator.activeDocumentType,
        stores,
        chunking: {
          max_tokens_per_chunk: config.chunking.maxTokensPerChunk,
          max_overlap_tokens: config.chunking.maxOverlapTokens,
        },
        poll_interval_ms: config.pollIntervalMs,
        operation_timeout_ms: config.operationTimeoutMs,
        graph_store_configured: hasGraphStore(),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const storeTools: Record<string, ToolDefinition> = {
  store_select: {
    description: 'Switch the active document store (abstracts or manuscripts), creating the remote store if needed',
    inputSchema: {
      document_type: DocumentTypeSchema.describe('Logical store to activate'),
    },
    handler: handleStoreSelect,
  },

  store_status: {
    description: 'Show the active document type, resolved stores and chunking configuration',
    inputSchema: {},
    handler: handleStoreStatus,
  },
};
