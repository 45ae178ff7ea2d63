/**
 * MCP Server Module Exports
 *
 * Re-exports all server components for external use.
 *
 * @module server
 */

// Error handling
export {
  MCPError,
  formatErrorResponse,
  errorMessage,
  validationError,
  invalidDocumentTypeError,
  storeResolutionError,
  taskNotFoundError,
  serviceNotConfiguredError,
  pathNotFoundError,
  pathNotDirectoryError,
  internalError,
  type ErrorCategory,
  type ErrorResponse,
} from './errors.js';

// Type definitions
export {
  type ToolResult,
  type ToolResultSuccess,
  type ToolResultFailure,
  type ToolError,
  type ServerConfig,
  type DocumentType,
  type DocumentTypeConfig,
  type MetadataSchemaVersion,
  type ChunkingConfig,
  type Neo4jConnectionConfig,
  successResult,
  failureResult,
} from './types.js';

// Configuration
export { loadServerConfig, isDocumentType, DOCUMENT_TYPES, ALLOWED_OVERLAP_TOKENS, DEFAULT_CHUNKING } from './config.js';

// State management
export {
  configureServices,
  resetState,
  getConfig,
  requireIngestion,
  getTaskTracker,
  requireGraphStore,
  hasGraphStore,
  requireKnowledgeGraphAgent,
  requireTextExtractor,
  type ServiceOverrides,
  type IngestionServices,
} from './state.js';
