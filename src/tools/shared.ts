/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';
import type { MetadataFields } from '../services/file-search/metadata.js';
import type { MetadataFieldsInput } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response
 */
export function formatResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Handle errors uniformly - tool handlers never throw
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return formatResponse(formatErrorResponse(mcpError));
}

/**
 * snake_case tool fields to the metadata builder's field names
 */
export function toMetadataFields(input: MetadataFieldsInput): MetadataFields {
  const fields: MetadataFields = {};
  if (input.title !== undefined) fields.title = input.title;
  if (input.id !== undefined) fields.id = input.id;
  if (input.short_name !== undefined) fields.shortName = input.short_name;
  if (input.abstract_title !== undefined) fields.abstractTitle = input.abstract_title;
  if (input.abstract_id !== undefined) fields.abstractId = input.abstract_id;
  return fields;
}
