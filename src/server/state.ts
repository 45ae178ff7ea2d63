/**
 * MCP Server State Management
 *
 * Holds the process-wide service graph: configuration, the file search
 * collaborator, the store registry and everything built on it. Services are
 * created on first use so the server starts without credentials and only the
 * tools that need a collaborator fail.
 * FAIL FAST: every require* accessor throws SERVICE_NOT_CONFIGURED when its
 * collaborator cannot be built.
 *
 * @module server/state
 */

import { loadServerConfig } from './config.js';
import { serviceNotConfiguredError } from './errors.js';
import type { ServerConfig } from './types.js';
import { GeminiClient } from '../services/gemini/client.js';
import { GeminiFileSearchService } from '../services/file-search/gemini-file-search.js';
import { StoreRegistry } from '../services/file-search/store-registry.js';
import type { FileSearchService } from '../services/file-search/types.js';
import { IngestionPipeline } from '../services/ingestion/pipeline.js';
import { DedupIndex } from '../services/ingestion/dedup-index.js';
import { BulkOrchestrator } from '../services/ingestion/bulk-orchestrator.js';
import { TaskTracker, type TaskStore } from '../services/ingestion/task-tracker.js';
import {
  InferredMetadataExtractor,
  type ExtractedMetadata,
  type MetadataExtractor,
} from '../services/ingestion/metadata-extractor.js';
import { GeminiTextExtractor, type TextExtractor } from '../services/ingestion/text-extractor.js';
import { KnowledgeGraphAgent } from '../services/knowledge-graph/agent.js';
import { GraphExtractor } from '../services/knowledge-graph/extractor.js';
import { Neo4jGraphStore, type GraphStore } from '../services/knowledge-graph/graph-store.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Replacements for collaborators, used by tests and by embedding callers
 */
export interface ServiceOverrides {
  config?: ServerConfig;
  fileSearch?: FileSearchService;
  metadataExtractor?: MetadataExtractor;
  textExtractor?: TextExtractor;
  textGenerator?: Pick<GeminiClient, 'generateText'>;
  /** null forces "not configured" even when NEO4J_* is set */
  graphStore?: GraphStore | null;
  taskStore?: TaskStore;
}

export interface IngestionServices {
  config: ServerConfig;
  fileSearch: FileSearchService;
  registry: StoreRegistry;
  pipeline: IngestionPipeline;
  dedup: DedupIndex;
  orchestrator: BulkOrchestrator;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

let _overrides: ServiceOverrides = {};
let _config: ServerConfig | null = null;
let _ingestion: IngestionServices | null = null;
let _tracker: TaskTracker | null = null;
let _gemini: GeminiClient | null = null;
let _graphStore: GraphStore | null = null;
let _agent: KnowledgeGraphAgent | null = null;
let _textExtractor: TextExtractor | null = null;

/**
 * Install collaborator overrides and drop every service built so far
 */
export async function configureServices(overrides: ServiceOverrides): Promise<void> {
  await resetState();
  _overrides = { ...overrides };
}

/**
 * Forget all services and overrides, closing the graph store connection
 */
export async function resetState(): Promise<void> {
  const graphStore = _graphStore;
  _overrides = {};
  _config = null;
  _ingestion = null;
  _tracker = null;
  _gemini = null;
  _graphStore = null;
  _agent = null;
  _textExtractor = null;
  if (graphStore) await graphStore.close();
}

export function getConfig(): ServerConfig {
  if (!_config) {
    _config = _overrides.config ?? loadServerConfig();
  }
  return _config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

function requireGemini(): GeminiClient {
  if (!_gemini) {
    if (!process.env.GEMINI_API_KEY) {
      throw serviceNotConfiguredError('Gemini', 'Set GEMINI_API_KEY in .env.');
    }
    _gemini = new GeminiClient();
  }
  return _gemini;
}

function buildFileSearch(config: ServerConfig): FileSearchService {
  if (_overrides.fileSearch) return _overrides.fileSearch;
  if (!process.env.GEMINI_API_KEY) {
    throw serviceNotConfiguredError('Gemini File Search', 'Set GEMINI_API_KEY in .env.');
  }
  return new GeminiFileSearchService({ queryModel: config.fileSearchModel });
}

/**
 * Builds the Gemini-backed metadata extractor only when auto mode is first used
 */
class LazyInferredExtractor implements MetadataExtractor {
  private inner: InferredMetadataExtractor | null = null;

  async extract(filePath: string, fileName: string): Promise<ExtractedMetadata> {
    if (!this.inner) this.inner = new InferredMetadataExtractor(requireGemini());
    return this.inner.extract(filePath, fileName);
  }
}

/**
 * File search collaborator and the ingestion services built on it
 *
 * @throws MCPError SERVICE_NOT_CONFIGURED without GEMINI_API_KEY
 */
export function requireIngestion(): IngestionServices {
  if (_ingestion) return _ingestion;

  const config = getConfig();
  const fileSearch = buildFileSearch(config);
  const registry = new StoreRegistry(fileSearch);
  const pipeline = new IngestionPipeline({
    service: fileSearch,
    registry,
    config,
    inferredExtractor: _overrides.metadataExtractor ?? new LazyInferredExtractor(),
  });
  const dedup = new DedupIndex(fileSearch);
  const orchestrator = new BulkOrchestrator({
    pipeline,
    registry,
    dedup,
    documentTypes: config.documentTypes,
  });

  _ingestion = { config, fileSearch, registry, pipeline, dedup, orchestrator };
  return _ingestion;
}

export function getTaskTracker(): TaskTracker {
  if (!_tracker) {
    _tracker = new TaskTracker(_overrides.taskStore);
  }
  return _tracker;
}

/**
 * @throws MCPError SERVICE_NOT_CONFIGURED without NEO4J_URI / NEO4J_USERNAME / NEO4J_PASSWORD
 */
export function requireGraphStore(): GraphStore {
  if (_graphStore) return _graphStore;

  if (_overrides.graphStore !== undefined) {
    if (_overrides.graphStore === null) {
      throw serviceNotConfiguredError('Neo4j', 'Set NEO4J_URI, NEO4J_USERNAME and NEO4J_PASSWORD in .env.');
    }
    _graphStore = _overrides.graphStore;
    return _graphStore;
  }

  const { neo4j } = getConfig();
  if (!neo4j) {
    throw serviceNotConfiguredError('Neo4j', 'Set NEO4J_URI, NEO4J_USERNAME and NEO4J_PASSWORD in .env.');
  }
  _graphStore = new Neo4jGraphStore(neo4j);
  return _graphStore;
}

export function hasGraphStore(): boolean {
  if (_overrides.graphStore !== undefined) return _overrides.graphStore !== null;
  return getConfig().neo4j !== null;
}

/**
 * @throws MCPError SERVICE_NOT_CONFIGURED without GEMINI_API_KEY
 */
export function requireKnowledgeGraphAgent(): KnowledgeGraphAgent {
  if (!_agent) {
    _agent = new KnowledgeGraphAgent(_overrides.textGenerator ?? requireGemini(), new GraphExtractor());
  }
  return _agent;
}

/**
 * @throws MCPError SERVICE_NOT_CONFIGURED without GEMINI_API_KEY
 */
export function requireTextExtractor(): TextExtractor {
  if (!_textExtractor) {
    _textExtractor = _overrides.textExtractor ?? new GeminiTextExtractor(requireGemini());
  }
  return _textExtractor;
}
