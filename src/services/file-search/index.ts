/**
 * File search store services
 *
 * @module services/file-search
 */

export {
  type Store,
  type CustomMetadataEntry,
  type OperationErrorInfo,
  type UploadOperation,
  type RemoteDocument,
  type UploadRequest,
  type SearchAnswer,
  type FileSearchService,
} from './types.js';

export {
  decodeOperation,
  inspectOperation,
  pollOperation,
  operationFailedError,
  type OperationState,
  type OperationErrorLevel,
  type PollOptions,
} from './operation.js';

export {
  MISSING_ID,
  METADATA_KEYS,
  encodeMetadata,
  decodeMetadata,
  toDocumentRecord,
  dedupKeyOf,
  displayNameOf,
  buildMetadata,
  fileStem,
  type LegacyMetadata,
  type CurrentMetadata,
  type DocumentMetadata,
  type UnknownMetadata,
  type DocumentRecord,
  type MetadataFields,
} from './metadata.js';

export { StoreRegistry, matchesLogicalName } from './store-registry.js';
export { GeminiFileSearchService, type GeminiFileSearchOptions } from './gemini-file-search.js';
