/**
 * Gemini text generation for the ingestion pipeline.
 *
 * - generateText(): prompt in, free-form text out (graph extraction)
 * - analyzePDF(): inline PDF plus prompt (metadata inference, transcription)
 *
 * Each call runs inside the circuit breaker, and each attempt inside it is
 * retried with exponential backoff.
 */

import {
  GoogleGenerativeAI,
  type GenerateContentResult,
  type GenerationConfig,
  type GenerativeModel,
  type Part,
} from '@google/generative-ai';
import * as fs from 'fs';
import * as path from 'path';

import {
  type AllowedMimeType,
  type GeminiConfig,
  type GeminiConfigInput,
  GENERATION_PRESETS,
  MAX_FILE_SIZE,
  loadGeminiConfig,
} from './config.js';
import { CircuitBreaker, CircuitBreakerOpenError } from './circuit-breaker.js';

export { CircuitBreakerOpenError };

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GeminiResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

/** Document sent inline with a request, base64 encoded */
export interface FileRef {
  mimeType: AllowedMimeType;
  data: string;
  sizeBytes: number;
}

export type ResponseFormat = 'json' | 'text';

const EXTENSION_MIME_TYPES: Record<string, AllowedMimeType> = {
  pdf: 'application/pdf',
  txt: 'text/plain',
};

type FailureKind = 'rate_limited' | 'context_overflow' | 'transient';

function classifyFailure(message: string): FailureKind {
  const lower = message.toLowerCase();
  if (message.includes('429') || lower.includes('rate limit')) return 'rate_limited';
  if (lower.includes('context length')) return 'context_overflow';
  return 'transient';
}

function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

export class GeminiClient {
  private readonly config: GeminiConfig;
  private readonly model: GenerativeModel;
  private readonly breaker: CircuitBreaker;

  constructor(overrides?: Partial<GeminiConfigInput>) {
    this.config = loadGeminiConfig(overrides);
    this.model = new GoogleGenerativeAI(this.config.apiKey).getGenerativeModel({ model: this.config.model });
    this.breaker = new CircuitBreaker({ name: 'GeminiClient', ...this.config.circuitBreaker });
  }

  async generateText(prompt: string, format: ResponseFormat = 'text'): Promise<GeminiResponse> {
    return this.generate([{ text: prompt }], format);
  }

  /**
   * The PDF part goes first so the prompt reads as an instruction about it.
   */
  async analyzePDF(prompt: string, file: FileRef, format: ResponseFormat = 'json'): Promise<GeminiResponse> {
    if (file.mimeType !== 'application/pdf') {
      throw new Error('File must be a PDF (application/pdf)');
    }
    return this.generate([{ inlineData: { mimeType: file.mimeType, data: file.data } }, { text: prompt }], format);
  }

  private async generate(parts: Part[], format: ResponseFormat): Promise<GeminiResponse> {
    const started = Date.now();
    const preset: GenerationConfig = GENERATION_PRESETS[format];
    const generationConfig: GenerationConfig = {
      ...preset,
      temperature: preset.temperature ?? this.config.temperature,
      maxOutputTokens: Math.min(preset.maxOutputTokens ?? this.config.maxOutputTokens, this.config.maxOutputTokens),
    };

    const result = await this.breaker.execute(() =>
      this.withRetry(() => this.model.generateContent({ contents: [{ role: 'user', parts }], generationConfig }))
    );

    const usage = result.response.usageMetadata;
    return {
      text: result.response.text(),
      usage: {
        inputTokens: usage?.promptTokenCount ?? 0,
        outputTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      model: this.config.model,
      processingTimeMs: Date.now() - started,
    };
  }

  private async withRetry(request: () => Promise<GenerateContentResult>): Promise<GenerateContentResult> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;
    let lastError = new Error('All retry attempts failed');

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        return await request();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        console.warn(`[GeminiClient] Attempt ${attempt + 1}/${maxAttempts} failed: ${lastError.message}`);

        const kind = classifyFailure(lastError.message);
        // The same prompt overflows on every attempt
        if (kind === 'context_overflow') {
          throw new Error('Context length exceeded. Split the document text before extraction.');
        }
        if (attempt === maxAttempts - 1) break;

        const delay = backoffDelay(kind === 'rate_limited' ? attempt + 1 : attempt, baseDelayMs, maxDelayMs);
        console.error(`[GeminiClient] ${kind === 'rate_limited' ? 'Rate limited' : 'Retrying'}, waiting ${delay}ms`);
        await sleep(delay);
      }
    }

    throw lastError;
  }

  /**
   * Read a PDF (or plain text) file for an inline request
   * @throws Error for other extensions or files over 20MB
   */
  static fileRefFromPath(filePath: string): FileRef {
    const ext = path.extname(filePath).toLowerCase().slice(1);
    const mimeType = EXTENSION_MIME_TYPES[ext];
    if (!mimeType) {
      throw new Error(
        `Unsupported document format: '${ext}' (file: ${path.basename(filePath)}). ` +
          `Accepted: ${Object.keys(EXTENSION_MIME_TYPES).join(', ')}`
      );
    }

    const buffer = fs.readFileSync(filePath);
    if (buffer.length > MAX_FILE_SIZE) {
      throw new Error(`File too large: ${buffer.length} bytes. Max: ${MAX_FILE_SIZE} (20MB)`);
    }
    return { mimeType, data: buffer.toString('base64'), sizeBytes: buffer.length };
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
