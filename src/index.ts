#!/usr/bin/env node
/**
 * Document ingestion MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes store, ingestion, task, document, search and knowledge graph tools
 * via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { allTools } from './tools/index.js';
import { resetState } from './server/state.js';

dotenv.config();

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'docgraph-ingest',
  version: '1.0.0',
});

for (const [name, tool] of Object.entries(allTools)) {
  server.tool(name, tool.description, tool.inputSchema, async (params) => tool.handler(params));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

async function shutdown(signal: string): Promise<void> {
  console.error(`Received ${signal}, closing connections`);
  await resetState();
  process.exit(0);
}

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Document ingestion MCP Server running on stdio');
  console.error(`Tools registered: ${Object.keys(allTools).length}`);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
