/**
 * Unit tests for MCPError and error factories
 */

import { describe, it, expect } from 'vitest';
import {
  MCPError,
  formatErrorResponse,
  errorMessage,
  invalidDocumentTypeError,
  storeResolutionError,
  taskNotFoundError,
  serviceNotConfiguredError,
} from '../../../src/server/index.js';
import { ValidationError } from '../../../src/utils/index.js';

describe('MCPError.fromUnknown', () => {
  it('should return an MCPError unchanged', () => {
    const original = new MCPError('TASK_NOT_FOUND', 'gone');

    expect(MCPError.fromUnknown(original)).toBe(original);
  });

  it('should map known error names to categories', () => {
    expect(MCPError.fromUnknown(new ValidationError('bad')).category).toBe('VALIDATION_ERROR');

    const neo4jError = new Error('refused');
    neo4jError.name = 'Neo4jError';
    expect(MCPError.fromUnknown(neo4jError).category).toBe('GRAPH_STORE_ERROR');
  });

  it('should use the default category for other errors and values', () => {
    expect(MCPError.fromUnknown(new Error('boom')).category).toBe('INTERNAL_ERROR');
    expect(MCPError.fromUnknown(new Error('boom'), 'GRAPH_STORE_ERROR').category).toBe('GRAPH_STORE_ERROR');

    const fromString = MCPError.fromUnknown('plain failure');
    expect(fromString.message).toBe('plain failure');
    expect(fromString.details).toEqual({ originalValue: 'plain failure' });
  });
});

describe('formatErrorResponse', () => {
  it('should produce the tool error shape', () => {
    expect(formatErrorResponse(new MCPError('PATH_NOT_FOUND', 'missing', { path: '/x' }))).toEqual({
      success: false,
      error: { category: 'PATH_NOT_FOUND', message: 'missing', details: { path: '/x' } },
    });
  });
});

describe('error factories', () => {
  it('should describe the allowed document types', () => {
    const error = invalidDocumentTypeError('letters', ['abstracts', 'manuscripts']);

    expect(error.category).toBe('INVALID_DOCUMENT_TYPE');
    expect(error.message).toBe('Invalid document type "letters". Expected one of: abstracts, manuscripts');
  });

  it('should include the cause of a store resolution failure', () => {
    expect(storeResolutionError('abstracts_store', new Error('quota exceeded')).message).toBe(
      'Could not resolve file search store "abstracts_store": quota exceeded'
    );
  });

  it('should point at task_list for unknown tasks', () => {
    expect(taskNotFoundError('t1').message).toBe('Task not found: t1. Use task_list to see known tasks.');
  });

  it('should name the missing service', () => {
    const error = serviceNotConfiguredError('Neo4j', 'Set NEO4J_URI.');

    expect(error.message).toBe('Neo4j is not configured. Set NEO4J_URI.');
    expect(error.details).toEqual({ service: 'Neo4j' });
  });

  it('should render any value as a message', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
  });
});
