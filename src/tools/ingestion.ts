/**
 * Ingestion MCP Tools
 *
 * Tools: document_ingest, folder_ingest
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/ingestion
 */

import * as path from 'path';
import { z } from 'zod';
import {
  requireIngestion,
  getTaskTracker,
  requireGraphStore,
  requireKnowledgeGraphAgent,
  requireTextExtractor,
} from '../server/state.js';
import { successResult } from '../server/types.js';
import { errorMessage } from '../server/errors.js';
import { assertDirectory } from '../utils/files.js';
import type { MetadataOverrides } from '../services/ingestion/bulk-orchestrator.js';
import type { IngestDocumentResult } from '../services/ingestion/pipeline.js';
import {
  validateInput,
  DocumentIngestInput,
  FolderIngestInput,
  DocumentTypeSchema,
  MetadataMode,
  MetadataFieldsSchema,
} from '../utils/validation.js';
import { formatResponse, handleError, toMetadataFields, type ToolResponse, type ToolDefinition } from './shared.js';

/** Provenance written on every node and relationship built during ingestion */
export const INGESTION_GRAPH_SOURCE = 'ingestion_pipeline';

interface GraphBuildOutcome {
  success: boolean;
  nodes?: number;
  relationships?: number;
  error?: string;
}

/**
 * Transcribe the uploaded PDF, extract a graph and store it.
 * Failures are reported, not thrown: the document is already indexed.
 */
async function buildGraphForDocument(filePath: string, ingested: IngestDocumentResult): Promise<GraphBuildOutcome> {
  const graphStore = requireGraphStore();
  const agent = requireKnowledgeGraphAgent();
  const textExtractor = requireTextExtractor();

  try {
    const text = await textExtractor.extractText(filePath);
    const element = await agent.extract(text, {
      document_title: ingested.extracted.title,
      document_id: ingested.extracted.id,
      file_name: path.basename(filePath),
      source: INGESTION_GRAPH_SOURCE,
    });
    const summary = await graphStore.addGraphElements([element]);
    return { success: true, nodes: summary.nodes, relationships: summary.relationships };
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[Ingestion] Graph build failed for ${path.basename(filePath)}: ${message}`);
    return { success: false, error: message };
  }
}

export async function handleDocumentIngest(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentIngestInput, params);
    const { pipeline, orchestrator } = requireIngestion();
    const filePath = path.resolve(input.file_path);
    const documentType = input.document_type ?? orchestrator.activeDocumentType;

    if (input.build_graph) {
      // Fail before uploading when the graph side is not configured
      requireGraphStore();
      requireKnowledgeGraphAgent();
      requireTextExtractor();
    }

    const ingested = await pipeline.ingestDocument({
      filePath,
      documentType,
      metadataMode: input.metadata_mode,
      fields: toMetadataFields(input),
    });

    const graph = input.build_graph ? await buildGraphForDocument(filePath, ingested) : null;

    return formatResponse(
      successResult({
        document_type: documentType,
        store_name: ingested.store.name,
        operation_name: ingested.operation.name,
        document_name: ingested.operation.result?.documentName ?? null,
        metadata: ingested.metadata,
        metadata_source: ingested.extracted.source,
        graph,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleFolderIngest(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FolderIngestInput, params);
    const { orchestrator } = requireIngestion();
    const folderPath = path.resolve(input.folder_path);

    // Reject a bad folder here instead of in a task nobody may poll
    await assertDirectory(folderPath);

    const overrides: MetadataOverrides = {};
    for (const [filename, fields] of Object.entries(input.metadata_overrides)) {
      overrides[filename] = toMetadataFields(fields);
    }

    const tracker = getTaskTracker();
    const task = tracker.create(input.document_type);
    void tracker.runInBackground(task.id, () =>
      orchestrator.ingestFolder(folderPath, input.document_type, overrides, (event) => {
        tracker.update(task.id, event);
      })
    );

    return formatResponse(
      successResult({
        task_id: task.id,
        status: task.status,
        folder_path: folderPath,
        document_type: input.document_type,
        message: 'Folder ingestion started. Poll task_status with the task_id.',
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const ingestionTools: Record<string, ToolDefinition> = {
  document_ingest: {
    description:
      'Upload one PDF to the file search store, with inferred or manual title/ID metadata, optionally building its knowledge graph',
    inputSchema: {
      file_path: z.string().min(1).describe('Path to the PDF'),
      document_type: DocumentTypeSchema.optional().describe('Target store; defaults to the active one'),
      metadata_mode: MetadataMode.default('auto').describe('auto infers title/ID with Gemini unless given, manual uses the given values only'),
      title: z.string().optional().describe('Document title (required in manual mode)'),
      id: z.string().optional().describe('Document ID; N/A when omitted'),
      short_name: z.string().optional().describe('Short name for manuscripts; defaults to the filename stem'),
      abstract_title: z.string().optional().describe('Title of the related abstract (manuscripts)'),
      abstract_id: z.string().optional().describe('ID of the related abstract (manuscripts)'),
      build_graph: z.boolean().default(false).describe('Transcribe the PDF and write its knowledge graph to Neo4j'),
    },
    handler: handleDocumentIngest,
  },

  folder_ingest: {
    description: 'Start a background upload of every PDF in a folder; returns a task_id to poll',
    inputSchema: {
      folder_path: z.string().min(1).describe('Folder containing the PDFs (not searched recursively)'),
      document_type: DocumentTypeSchema.describe('Target store'),
      metadata_overrides: z
        .record(z.string(), MetadataFieldsSchema)
        .optional()
        .describe('Per-filename metadata, e.g. {"354.pdf": {"short_name": "354"}}'),
    },
    handler: handleFolderIngest,
  },
};
