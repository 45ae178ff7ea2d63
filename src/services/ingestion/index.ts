/**
 * Ingestion Services
 *
 * Single-document upload, folder batches, dedup and task tracking.
 */

export { IngestionPipeline } from './pipeline.js';

export type {
  IngestDocumentRequest,
  IngestDocumentResult,
  IngestionPipelineDeps,
  MetadataMode,
  PipelineConfig,
  UploadOptions,
} from './pipeline.js';

export {
  InferredMetadataExtractor,
  ManualMetadataExtractor,
  fallbackMetadata,
  stripCodeFences,
} from './metadata-extractor.js';

export type {
  ExtractedMetadata,
  ManualMetadataInput,
  MetadataExtractor,
  MetadataSource,
} from './metadata-extractor.js';

export { DedupIndex } from './dedup-index.js';

export { BulkOrchestrator } from './bulk-orchestrator.js';

export type {
  BatchResult,
  BulkOrchestratorDeps,
  FileStatus,
  MetadataOverrides,
  ProcessedFile,
  ProgressCallback,
  ProgressEvent,
} from './bulk-orchestrator.js';

export { TaskTracker, InMemoryTaskStore } from './task-tracker.js';

export type { Task, TaskStatus, TaskStore } from './task-tracker.js';

export { GeminiTextExtractor } from './text-extractor.js';

export type { TextExtractor } from './text-extractor.js';
