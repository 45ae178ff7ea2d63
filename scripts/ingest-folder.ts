/**
 * Folder Ingestion Script
 *
 * Uploads every PDF in a folder to the store of a document type, skipping
 * documents the store already holds, without MCP timeout constraints.
 * Usage: npx tsx scripts/ingest-folder.ts <folder> [abstracts|manuscripts]
 */

import dotenv from 'dotenv';
dotenv.config();

import * as path from 'path';
import { DOCUMENT_TYPES, isDocumentType } from '../src/server/config.js';
import { MCPError } from '../src/server/errors.js';
import { requireIngestion, resetState } from '../src/server/state.js';
import type { ProgressEvent } from '../src/services/ingestion/bulk-orchestrator.js';

function logProgress(event: ProgressEvent): void {
  const suffix = event.error ? ` - ${event.error}` : '';
  console.error(`[${event.current}/${event.total}] ${event.status.toUpperCase()} ${event.filename}${suffix}`);
}

async function main(): Promise<number> {
  const [folderArg, typeArg = 'abstracts'] = process.argv.slice(2);
  if (!folderArg) {
    console.error('Usage: npx tsx scripts/ingest-folder.ts <folder> [abstracts|manuscripts]');
    return 2;
  }
  if (!isDocumentType(typeArg)) {
    console.error(`Unknown document type "${typeArg}". Expected one of: ${DOCUMENT_TYPES.join(', ')}`);
    return 2;
  }

  const folder = path.resolve(folderArg);
  const { orchestrator } = requireIngestion();

  console.error(`Ingesting ${folder} as ${typeArg}`);
  const started = Date.now();
  const result = await orchestrator.ingestFolder(folder, typeArg, {}, logProgress);
  const seconds = ((Date.now() - started) / 1000).toFixed(1);

  console.error('\n=== SUMMARY ===');
  console.error(`Total:      ${result.total}`);
  console.error(`Successful: ${result.successful}`);
  console.error(`Skipped:    ${result.skipped}`);
  console.error(`Failed:     ${result.failed}`);
  console.error(`Elapsed:    ${seconds}s`);
  for (const line of result.errors) {
    console.error(`  ${line}`);
  }

  return result.failed > 0 ? 1 : 0;
}

main()
  .then(async (code) => {
    await resetState();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    const mcpError = MCPError.fromUnknown(error);
    console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
    await resetState();
    process.exit(1);
  });
