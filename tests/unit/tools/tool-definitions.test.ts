/**
 * Tool Definitions Validation Tests
 *
 * Every exported tool has a description, a Zod input shape and a handler,
 * and the server registers exactly the expected set.
 */

import { describe, it, expect } from 'vitest';
import { allTools } from '../../../src/tools/index.js';

describe('Tool definitions validation', () => {
  it('should register the full tool set', () => {
    expect(Object.keys(allTools).sort()).toEqual([
      'document_delete',
      'document_ingest',
      'document_list',
      'folder_ingest',
      'kg_extract',
      'search_query',
      'store_select',
      'store_status',
      'task_list',
      'task_status',
    ]);
  });

  for (const [toolName, tool] of Object.entries(allTools)) {
    it(`${toolName} should have a description, schema and handler`, () => {
      expect(tool.description.length, `${toolName} description empty`).toBeGreaterThan(0);
      expect(typeof tool.handler, `${toolName} handler not function`).toBe('function');
      for (const [fieldName, field] of Object.entries(tool.inputSchema)) {
        // Zod schemas have a _def property
        expect(field._def, `${toolName}.inputSchema.${fieldName} should be a Zod schema`).toBeDefined();
      }
    });
  }
});
