/**
 * MCP Tool Module Exports
 *
 * Barrel export for all tool modules.
 *
 * @module tools
 */

import type { ToolDefinition } from './shared.js';
import { storeTools } from './stores.js';
import { ingestionTools } from './ingestion.js';
import { taskTools } from './tasks.js';
import { documentTools } from './documents.js';
import { searchTools } from './search.js';
import { knowledgeGraphTools } from './knowledge-graph.js';

export * from './shared.js';
export { storeTools, ingestionTools, taskTools, documentTools, searchTools, knowledgeGraphTools };

export const allTools: Record<string, ToolDefinition> = {
  ...storeTools,
  ...ingestionTools,
  ...taskTools,
  ...documentTools,
  ...searchTools,
  ...knowledgeGraphTools,
};
