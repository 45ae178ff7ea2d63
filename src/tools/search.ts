/**
 * Search MCP Tools
 *
 * Tools: search_query
 *
 * @module tools/search
 */

import { z } from 'zod';
import { requireIngestion } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, SearchQueryInput, DocumentTypeSchema } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleSearchQuery(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SearchQueryInput, params);
    const { registry, fileSearch, orchestrator, config } = requireIngestion();
    const documentType = input.document_type ?? orchestrator.activeDocumentType;

    const store = await registry.resolve(config.documentTypes[documentType].storeName);
    const answer = await fileSearch.query(store.name, input.question);

    return formatResponse(
      successResult({
        question: input.question,
        document_type: documentType,
        answer: answer.text,
        citations: answer.citations,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const searchTools: Record<string, ToolDefinition> = {
  search_query: {
    description: 'Answer a question grounded in the documents of a file search store, with cited document titles',
    inputSchema: {
      question: z.string().min(1).max(4000).describe('Question to answer'),
      document_type: DocumentTypeSchema.optional().describe('Store to search; defaults to the active one'),
    },
    handler: handleSearchQuery,
  },
};
