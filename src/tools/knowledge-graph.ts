/**
 * Knowledge Graph MCP Tools
 *
 * Tools: kg_extract
 *
 * @module tools/knowledge-graph
 */

import { z } from 'zod';
import { requireGraphStore, requireKnowledgeGraphAgent } from '../server/state.js';
import { successResult } from '../server/types.js';
import { GraphExtractor, type ExtractionReport } from '../services/knowledge-graph/extractor.js';
import type { GraphElement } from '../models/graph.js';
import { validateInput, KgExtractInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

function serializeElement(element: GraphElement) {
  return {
    nodes: element.nodes.map((n) => ({ id: n.id, type: n.type, properties: n.properties })),
    relationships: element.relationships.map((r) => ({
      subject: r.subject.id,
      object: r.object.id,
      type: r.type,
      timestamp: r.timestamp ?? null,
      properties: r.properties,
    })),
  };
}

export async function handleKgExtract(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(KgExtractInput, params);
    // Fail before generating anything when the result cannot be stored
    const graphStore = input.store ? requireGraphStore() : null;
    const options = { strictVocabulary: input.strict_vocabulary };

    let report: ExtractionReport;
    if (input.parse_only) {
      report = new GraphExtractor().extractWithReport(input.text, input.metadata, options);
    } else {
      report = await requireKnowledgeGraphAgent().run(input.text, input.metadata, options);
    }

    const stored = graphStore ? await graphStore.addGraphElements([report.element]) : null;

    return formatResponse(
      successResult({
        ...serializeElement(report.element),
        node_count: report.element.nodes.length,
        relationship_count: report.element.relationships.length,
        diagnostics: report.diagnostics,
        rejected: report.rejected,
        stored,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const knowledgeGraphTools: Record<string, ToolDefinition> = {
  kg_extract: {
    description:
      'Extract a knowledge graph (nodes and relationships) from text with Gemini, or parse already generated Node/Relationship literals, optionally writing it to Neo4j',
    inputSchema: {
      text: z.string().min(1).describe('Source content, or generated literals when parse_only is set'),
      parse_only: z.boolean().default(false).describe('Parse text as Node(...)/Relationship(...) literals without calling Gemini'),
      metadata: z
        .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
        .optional()
        .describe('Provenance merged into every node and relationship; overrides source'),
      strict_vocabulary: z.boolean().default(false).describe('Drop node and relationship types outside the known vocabulary'),
      store: z.boolean().default(false).describe('Write the graph to Neo4j'),
    },
    handler: handleKgExtract,
  },
};
