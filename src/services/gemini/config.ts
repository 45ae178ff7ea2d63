/**
 * Gemini API Configuration
 *
 * Settings for the text-generation side of the pipeline: metadata inference,
 * PDF transcription and knowledge graph extraction.
 */

import { z } from 'zod';

export const GEMINI_MODELS = {
  FLASH_2: 'gemini-2.0-flash',
  FLASH_25: 'gemini-2.5-flash',
  PRO: 'gemini-2.5-pro',
} as const;

export type GeminiModelId = (typeof GEMINI_MODELS)[keyof typeof GEMINI_MODELS];

// Formats the metadata and transcription prompts are sent with
export const ALLOWED_MIME_TYPES = ['application/pdf', 'text/plain'] as const;

export type AllowedMimeType = (typeof ALLOWED_MIME_TYPES)[number];

// Inline request payload limit: 20MB
export const MAX_FILE_SIZE = 20 * 1024 * 1024;

export const GeminiConfigSchema = z.object({
  apiKey: z.string().min(1, 'GEMINI_API_KEY is required'),
  model: z
    .enum([GEMINI_MODELS.FLASH_2, GEMINI_MODELS.FLASH_25, GEMINI_MODELS.PRO])
    .default(GEMINI_MODELS.FLASH_25),

  maxOutputTokens: z.number().int().positive().default(8192),
  // Graph extraction relies on deterministic output
  temperature: z.number().min(0).max(2).default(0.0),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().nonnegative().default(500),
      maxDelayMs: z.number().int().nonnegative().default(10000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().nonnegative().default(60000),
    })
    .default({}),
});

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;
export type GeminiConfigInput = z.input<typeof GeminiConfigSchema>;

/**
 * Load configuration from environment variables
 */
export function loadGeminiConfig(overrides?: Partial<GeminiConfigInput>): GeminiConfig {
  const envConfig = {
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || GEMINI_MODELS.FLASH_25,
    maxOutputTokens: process.env.GEMINI_MAX_OUTPUT_TOKENS
      ? parseInt(process.env.GEMINI_MAX_OUTPUT_TOKENS, 10)
      : 8192,
    temperature: process.env.GEMINI_TEMPERATURE
      ? parseFloat(process.env.GEMINI_TEMPERATURE)
      : 0.0,
  };

  return GeminiConfigSchema.parse({ ...envConfig, ...overrides });
}

/**
 * Generation presets
 */
export const GENERATION_PRESETS = {
  // JSON answers (metadata inference)
  json: {
    temperature: 0.0,
    maxOutputTokens: 1024,
    responseMimeType: 'application/json' as const,
  },

  // Free-form text (graph literals, transcription)
  text: {
    temperature: 0.0,
    maxOutputTokens: 8192,
    responseMimeType: 'text/plain' as const,
  },
} as const;
