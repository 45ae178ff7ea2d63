/**
 * Document MCP Tools
 *
 * Tools: document_list, document_delete
 *
 * @module tools/documents
 */

import { z } from 'zod';
import { requireIngestion } from '../server/state.js';
import { successResult } from '../server/types.js';
import { MISSING_ID, type DocumentRecord } from '../services/file-search/metadata.js';
import { validateInput, DocumentListInput, DocumentDeleteInput, DocumentTypeSchema } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

const UNKNOWN_FILE_NAME = 'Unknown';

/**
 * Flat listing row: title/id/file_name whichever layout the record uses
 */
export function toListItem(record: DocumentRecord): Record<string, unknown> {
  const { metadata } = record;
  const base = { name: record.remoteId, display_name: record.displayName, schema: metadata.schema };

  switch (metadata.schema) {
    case 'legacy':
      return {
        ...base,
        title: metadata.title,
        id: metadata.id,
        file_name: metadata.fileName || UNKNOWN_FILE_NAME,
      };
    case 'current':
      return {
        ...base,
        title: metadata.abstractTitle ?? metadata.shortName,
        id: metadata.abstractId ?? MISSING_ID,
        short_name: metadata.shortName,
        file_name: metadata.fileName || UNKNOWN_FILE_NAME,
      };
    case 'unknown':
      return { ...base, title: record.displayName, id: MISSING_ID, file_name: UNKNOWN_FILE_NAME };
  }
}

export async function handleDocumentList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentListInput, params);
    const { registry, dedup, orchestrator, config } = requireIngestion();
    const documentType = input.document_type ?? orchestrator.activeDocumentType;

    const store = await registry.resolve(config.documentTypes[documentType].storeName);
    const records = await dedup.records(store);

    return formatResponse(
      successResult({
        document_type: documentType,
        store_name: store.name,
        documents: records.map(toListItem),
        total: records.length,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentDeleteInput, params);
    const { fileSearch } = requireIngestion();

    await fileSearch.deleteDocument(input.document_name);
    console.error(`[Documents] Deleted ${input.document_name}`);
    return formatResponse(successResult({ document_name: input.document_name, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

export const documentTools: Record<string, ToolDefinition> = {
  document_list: {
    description: 'List documents in a file search store with their title, ID and file name',
    inputSchema: {
      document_type: DocumentTypeSchema.optional().describe('Store to list; defaults to the active one'),
    },
    handler: handleDocumentList,
  },

  document_delete: {
    description: 'Delete a document and all of its chunks from its file search store',
    inputSchema: {
      document_name: z.string().min(1).describe('Remote document name (fileSearchStores/.../documents/...)'),
    },
    handler: handleDocumentDelete,
  },
};
