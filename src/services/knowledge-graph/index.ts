/**
 * Knowledge Graph Services
 *
 * Literal grammar, validated extraction, the generation agent and the
 * graph database boundary.
 */

export { parseGraphLiterals } from './grammar.js';

export type { NodeLiteral, RelationshipLiteral, ParseDiagnostic, ParseResult } from './grammar.js';

export { GraphExtractor } from './extractor.js';

export type { ExtractOptions, ExtractionReport, Rejection, RejectionReason } from './extractor.js';

export { KnowledgeGraphAgent } from './agent.js';

export type { AgentRunOptions, AgentRunResult } from './agent.js';

export { createGraphExtractionPrompt } from './prompts.js';

export {
  Neo4jGraphStore,
  buildGraphWriteStatements,
  escapeIdentifier,
  toStoredProperties,
} from './graph-store.js';

export type { GraphStore, GraphWriteSummary, CypherStatement } from './graph-store.js';
