/**
 * Document text for graph extraction. Scanned pages are transcribed by
 * Gemini reading the PDF directly.
 *
 * @module services/ingestion/text-extractor
 */

import { GeminiClient } from '../gemini/client.js';
import { TRANSCRIPTION_PROMPT } from './prompts.js';

export interface TextExtractor {
  extractText(filePath: string): Promise<string>;
}

export class GeminiTextExtractor implements TextExtractor {
  private readonly client: GeminiClient;

  constructor(client?: GeminiClient) {
    this.client = client ?? new GeminiClient();
  }

  async extractText(filePath: string): Promise<string> {
    const fileRef = GeminiClient.fileRefFromPath(filePath);
    const response = await this.client.analyzePDF(TRANSCRIPTION_PROMPT, fileRef, 'text');
    const text = response.text.trim();
    if (!text) {
      throw new Error(`No text could be transcribed from ${filePath}`);
    }
    return text;
  }
}
