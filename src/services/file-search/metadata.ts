/**
 * Custom metadata schemas stored with every remote document.
 *
 * Two layouts exist side by side in the remote stores:
 * - legacy:  title, ID, file_name
 * - current: short_name, abstract_title?, abstract_id?, file_name
 *
 * The layout is carried as an explicit `schema` tag; encoding and decoding are
 * pure functions per version.
 *
 * @module services/file-search/metadata
 */

import { validationError } from '../../server/errors.js';
import type { MetadataSchemaVersion } from '../../server/types.js';
import type { CustomMetadataEntry, RemoteDocument } from './types.js';

export const MISSING_ID = 'N/A';

export const METADATA_KEYS = {
  legacy: { title: 'title', id: 'ID', fileName: 'file_name' },
  current: {
    shortName: 'short_name',
    abstractTitle: 'abstract_title',
    abstractId: 'abstract_id',
    fileName: 'file_name',
  },
} as const;

export interface LegacyMetadata {
  schema: 'legacy';
  title: string;
  id: string;
  fileName: string;
}

export interface CurrentMetadata {
  schema: 'current';
  shortName: string;
  abstractTitle?: string;
  abstractId?: string;
  fileName: string;
}

export type DocumentMetadata = LegacyMetadata | CurrentMetadata;

/**
 * Metadata of a remote document written by neither layout
 */
export interface UnknownMetadata {
  schema: 'unknown';
  entries: CustomMetadataEntry[];
}

export interface DocumentRecord {
  remoteId: string;
  displayName: string;
  metadata: DocumentMetadata | UnknownMetadata;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENCODING
// ═══════════════════════════════════════════════════════════════════════════════

function entry(key: string, stringValue: string): CustomMetadataEntry {
  return { key, stringValue };
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

/**
 * Ordered custom-metadata list for upload. Optional fields are left out
 * entirely rather than written empty.
 *
 * @throws ValidationError-category MCPError when the schema's mandatory key is blank
 */
export function encodeMetadata(metadata: DocumentMetadata): CustomMetadataEntry[] {
  switch (metadata.schema) {
    case 'legacy': {
      const keys = METADATA_KEYS.legacy;
      if (!present(metadata.title)) {
        throw validationError('title is required for legacy metadata', { fileName: metadata.fileName });
      }
      return [
        entry(keys.title, metadata.title.trim()),
        entry(keys.id, present(metadata.id) ? metadata.id.trim() : MISSING_ID),
        entry(keys.fileName, metadata.fileName),
      ];
    }
    case 'current': {
      const keys = METADATA_KEYS.current;
      if (!present(metadata.shortName)) {
        throw validationError('short_name is required for current metadata', { fileName: metadata.fileName });
      }
      const entries = [entry(keys.shortName, metadata.shortName.trim())];
      if (present(metadata.abstractTitle)) entries.push(entry(keys.abstractTitle, metadata.abstractTitle.trim()));
      if (present(metadata.abstractId)) entries.push(entry(keys.abstractId, metadata.abstractId.trim()));
      entries.push(entry(keys.fileName, metadata.fileName));
      return entries;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DECODING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recover the tagged metadata from remote entries. The schema is decided once,
 * here: `short_name` marks the current layout, `title` the legacy one.
 */
export function decodeMetadata(entries: CustomMetadataEntry[]): DocumentMetadata | UnknownMetadata {
  const values = new Map<string, string>();
  for (const e of entries) {
    if (!values.has(e.key)) values.set(e.key, e.stringValue);
  }

  const current = METADATA_KEYS.current;
  const shortName = values.get(current.shortName);
  if (shortName !== undefined) {
    const decoded: CurrentMetadata = {
      schema: 'current',
      shortName,
      fileName: values.get(current.fileName) ?? '',
    };
    const abstractTitle = values.get(current.abstractTitle);
    const abstractId = values.get(current.abstractId);
    if (abstractTitle !== undefined) decoded.abstractTitle = abstractTitle;
    if (abstractId !== undefined) decoded.abstractId = abstractId;
    return decoded;
  }

  const legacy = METADATA_KEYS.legacy;
  const title = values.get(legacy.title);
  if (title !== undefined) {
    return {
      schema: 'legacy',
      title,
      id: values.get(legacy.id) ?? MISSING_ID,
      fileName: values.get(legacy.fileName) ?? '',
    };
  }

  return { schema: 'unknown', entries };
}

export function toDocumentRecord(remote: RemoteDocument): DocumentRecord {
  return {
    remoteId: remote.name,
    displayName: remote.displayName,
    metadata: decodeMetadata(remote.customMetadata),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DERIVED VALUES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Value that identifies a document for deduplication, or null when the layout
 * carries none
 */
export function dedupKeyOf(metadata: DocumentMetadata | UnknownMetadata): string | null {
  switch (metadata.schema) {
    case 'current':
      return metadata.shortName;
    case 'legacy':
      return metadata.title;
    case 'unknown':
      return null;
  }
}

/**
 * Remote display name for an upload
 */
export function displayNameOf(metadata: DocumentMetadata): string {
  return metadata.schema === 'current' ? metadata.shortName.trim() : metadata.title.trim();
}

export interface MetadataFields {
  title?: string;
  id?: string;
  shortName?: string;
  abstractTitle?: string;
  abstractId?: string;
}

/**
 * Build metadata for a schema version from loosely supplied fields.
 * The short name defaults to the filename stem; the title to the short name.
 */
export function buildMetadata(
  schema: MetadataSchemaVersion,
  fileName: string,
  fields: MetadataFields = {}
): DocumentMetadata {
  const stem = fileStem(fileName);
  if (schema === 'current') {
    const metadata: CurrentMetadata = {
      schema: 'current',
      shortName: present(fields.shortName) ? fields.shortName.trim() : stem,
      fileName,
    };
    const abstractTitle = fields.abstractTitle ?? fields.title;
    const abstractId = fields.abstractId ?? fields.id;
    if (present(abstractTitle)) metadata.abstractTitle = abstractTitle.trim();
    if (present(abstractId) && abstractId.trim() !== MISSING_ID) metadata.abstractId = abstractId.trim();
    return metadata;
  }
  return {
    schema: 'legacy',
    title: present(fields.title) ? fields.title.trim() : stem,
    id: present(fields.id) ? fields.id.trim() : MISSING_ID,
    fileName,
  };
}

/**
 * Filename without its final extension: "354.pdf" -> "354"
 */
export function fileStem(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}
