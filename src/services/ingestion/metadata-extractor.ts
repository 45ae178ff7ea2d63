/**
 * Title and identifier resolution for a document about to be uploaded.
 *
 * Two interchangeable strategies:
 * - InferredMetadataExtractor asks Gemini to read the PDF; any failure falls
 *   back to the filename stem and "N/A"
 * - ManualMetadataExtractor takes caller-supplied values as they are
 *
 * @module services/ingestion/metadata-extractor
 */

import { z } from 'zod';
import { GeminiClient } from '../gemini/client.js';
import { errorMessage, validationError } from '../../server/errors.js';
import { MISSING_ID, fileStem } from '../file-search/metadata.js';
import { METADATA_PROMPT } from './prompts.js';

export type MetadataSource = 'inferred' | 'manual' | 'fallback';

export interface ExtractedMetadata {
  title: string;
  id: string;
  source: MetadataSource;
}

export interface MetadataExtractor {
  extract(filePath: string, fileName: string): Promise<ExtractedMetadata>;
}

const InferredMetadataSchema = z.object({
  title: z.string().trim().min(1),
  id: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined || String(v).trim() === '' ? MISSING_ID : String(v).trim())),
});

/**
 * Remove a surrounding ``` / ```json fence from a model answer
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[A-Za-z0-9_-]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export function fallbackMetadata(fileName: string): ExtractedMetadata {
  return { title: fileStem(fileName), id: MISSING_ID, source: 'fallback' };
}

export class InferredMetadataExtractor implements MetadataExtractor {
  private readonly client: GeminiClient;

  constructor(client?: GeminiClient) {
    this.client = client ?? new GeminiClient();
  }

  async extract(filePath: string, fileName: string): Promise<ExtractedMetadata> {
    try {
      const fileRef = GeminiClient.fileRefFromPath(filePath);
      const response = await this.client.analyzePDF(METADATA_PROMPT, fileRef, 'json');
      const parsed = InferredMetadataSchema.parse(JSON.parse(stripCodeFences(response.text)));
      return { title: parsed.title, id: parsed.id, source: 'inferred' };
    } catch (error) {
      console.error(`[MetadataExtractor] Inference failed for ${fileName}, using filename: ${errorMessage(error)}`);
      return fallbackMetadata(fileName);
    }
  }
}

export interface ManualMetadataInput {
  title: string;
  id?: string;
}

export class ManualMetadataExtractor implements MetadataExtractor {
  constructor(private readonly input: ManualMetadataInput) {}

  /**
   * @throws MCPError VALIDATION_ERROR when the title is blank
   */
  async extract(_filePath: string, fileName: string): Promise<ExtractedMetadata> {
    const title = this.input.title.trim();
    if (!title) {
      throw validationError('Title is required for manual metadata', { fileName });
    }
    const id = this.input.id?.trim();
    return { title, id: id ? id : MISSING_ID, source: 'manual' };
  }
}
