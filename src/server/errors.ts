/**
 * MCP Server Error Handling
 *
 * Every failure surfaces as an MCPError carrying a category, so tool clients can
 * tell a store that could not be resolved from a single document whose remote
 * ingestion job reported an error.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'
  | 'INVALID_DOCUMENT_TYPE'

  // File search store errors
  | 'STORE_RESOLUTION_FAILED'
  | 'OPERATION_FAILED'
  | 'OPERATION_TIMEOUT'
  | 'OPERATION_CANCELLED'

  // Task tracking errors
  | 'TASK_NOT_FOUND'

  // Gemini / graph collaborators
  | 'GEMINI_API_ERROR'
  | 'GRAPH_STORE_ERROR'
  | 'SERVICE_NOT_CONFIGURED'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 * Errors raised by collaborators keep their class name, so the mapping is by name.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  CircuitBreakerOpenError: 'GEMINI_API_ERROR',
  GoogleGenerativeAIError: 'GEMINI_API_ERROR',
  GoogleGenerativeAIFetchError: 'GEMINI_API_ERROR',
  ApiError: 'GEMINI_API_ERROR',
  Neo4jError: 'GRAPH_STORE_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Failure carried to the tool boundary with its category
 */
export class MCPError extends Error {
  constructor(
    readonly category: ErrorCategory,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MCPError';
    Error.captureStackTrace?.(this, MCPError);
  }

  /**
   * Wrap a caught value. Collaborator errors are categorised by class name;
   * anything unrecognised takes `defaultCategory`.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) return error;
    if (!(error instanceof Error)) {
      return new MCPError(defaultCategory, String(error), { originalValue: error });
    }
    return new MCPError(ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory, error.message, {
      originalName: error.name,
      stack: error.stack,
    });
  }
}

/**
 * Error response shape returned by every failing tool
 */
export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

/**
 * Render any caught value as a single-line message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function invalidDocumentTypeError(documentType: string, allowed: readonly string[]): MCPError {
  return new MCPError(
    'INVALID_DOCUMENT_TYPE',
    `Invalid document type "${documentType}". Expected one of: ${allowed.join(', ')}`,
    { documentType, allowed: [...allowed] }
  );
}

export function storeResolutionError(logicalName: string, cause: unknown): MCPError {
  return new MCPError(
    'STORE_RESOLUTION_FAILED',
    `Could not resolve file search store "${logicalName}": ${errorMessage(cause)}`,
    { logicalName }
  );
}

export function taskNotFoundError(taskId: string): MCPError {
  return new MCPError('TASK_NOT_FOUND', `Task not found: ${taskId}. Use task_list to see known tasks.`, {
    taskId,
  });
}

export function serviceNotConfiguredError(service: string, hint: string): MCPError {
  return new MCPError('SERVICE_NOT_CONFIGURED', `${service} is not configured. ${hint}`, { service });
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}

export function internalError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('INTERNAL_ERROR', message, details);
}
