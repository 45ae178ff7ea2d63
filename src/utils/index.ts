/**
 * Utility Functions Barrel Export
 *
 * @module utils
 */

// File system helpers
export {
  getFileExtension,
  pathKind,
  assertDirectory,
  assertFile,
  listFilesWithExtension,
  ensureDirectory,
} from './files.js';

export type { PathKind } from './files.js';

// Input validation
export {
  ValidationError,
  validateInput,
  DocumentTypeSchema,
  MetadataMode,
  MetadataFieldsSchema,
  StoreSelectInput,
  StoreStatusInput,
  DocumentIngestInput,
  FolderIngestInput,
  TaskStatusInput,
  TaskListInput,
  DocumentListInput,
  DocumentDeleteInput,
  SearchQueryInput,
  KgExtractInput,
} from './validation.js';

export type { MetadataFieldsInput } from './validation.js';
