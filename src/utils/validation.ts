/**
 * Zod Validation Schemas for MCP tool inputs
 *
 * Every handler re-validates its params with validateInput, so the same rules
 * apply whether a call came through the MCP server or directly from code.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { DOCUMENT_TYPES } from '../server/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError with "path: message; ..." if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentTypeSchema = z.enum(DOCUMENT_TYPES);

export const MetadataMode = z.enum(['auto', 'manual']);

const optionalText = z.string().trim().min(1).optional();

/**
 * Per-file metadata accepted by folder_ingest overrides
 */
export const MetadataFieldsSchema = z.object({
  title: optionalText,
  id: optionalText,
  short_name: optionalText,
  abstract_title: optionalText,
  abstract_id: optionalText,
});

// ═══════════════════════════════════════════════════════════════════════════════
// STORE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const StoreSelectInput = z.object({
  document_type: DocumentTypeSchema,
});

export const StoreStatusInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentIngestInput = z
  .object({
    file_path: z.string().min(1, 'file_path is required'),
    document_type: DocumentTypeSchema.optional(),
    metadata_mode: MetadataMode.default('auto'),
    title: z.string().optional(),
    id: z.string().optional(),
    short_name: z.string().optional(),
    abstract_title: z.string().optional(),
    abstract_id: z.string().optional(),
    build_graph: z.boolean().default(false),
  })
  .refine((input) => input.metadata_mode !== 'manual' || (input.title ?? '').trim() !== '', {
    message: 'title is required when metadata_mode is manual',
    path: ['title'],
  });

export const FolderIngestInput = z.object({
  folder_path: z.string().min(1, 'folder_path is required'),
  document_type: DocumentTypeSchema,
  metadata_overrides: z.record(z.string(), MetadataFieldsSchema).default({}),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TASK SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const TaskStatusInput = z.object({
  task_id: z.string().uuid('task_id must be a UUID'),
});

export const TaskListInput = z.object({
  status: z.enum(['processing', 'completed', 'failed']).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentListInput = z.object({
  document_type: DocumentTypeSchema.optional(),
});

export const DocumentDeleteInput = z.object({
  document_name: z
    .string()
    .min(1)
    .refine((name) => name.startsWith('fileSearchStores/'), {
      message: 'document_name must start with fileSearchStores/',
    }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SearchQueryInput = z.object({
  question: z.string().trim().min(1, 'question is required').max(4000),
  document_type: DocumentTypeSchema.optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// KNOWLEDGE GRAPH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const KgExtractInput = z.object({
  text: z.string().min(1, 'text is required'),
  /** Treat `text` as already generated literals instead of source content */
  parse_only: z.boolean().default(false),
  metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
  strict_vocabulary: z.boolean().default(false),
  store: z.boolean().default(false),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE EXPORTS
// ═══════════════════════════════════════════════════════════════════════════════

export type MetadataFieldsInput = z.infer<typeof MetadataFieldsSchema>;
export type StoreSelectInput = z.infer<typeof StoreSelectInput>;
export type DocumentIngestInput = z.infer<typeof DocumentIngestInput>;
export type FolderIngestInput = z.infer<typeof FolderIngestInput>;
export type TaskStatusInput = z.infer<typeof TaskStatusInput>;
export type TaskListInput = z.infer<typeof TaskListInput>;
export type DocumentListInput = z.infer<typeof DocumentListInput>;
export type DocumentDeleteInput = z.infer<typeof DocumentDeleteInput>;
export type SearchQueryInput = z.infer<typeof SearchQueryInput>;
export type KgExtractInput = z.infer<typeof KgExtractInput>;
