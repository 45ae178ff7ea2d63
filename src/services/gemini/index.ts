/**
 * Gemini API Service
 * Exports client and configuration for Gemini text generation
 */

// Client
export {
  GeminiClient,
  type GeminiResponse,
  type TokenUsage,
  type FileRef,
  type ResponseFormat,
  CircuitBreakerOpenError,
} from './client.js';

// Configuration
export {
  type GeminiConfig,
  type GeminiConfigInput,
  GeminiConfigSchema,
  loadGeminiConfig,
  GEMINI_MODELS,
  GENERATION_PRESETS,
  ALLOWED_MIME_TYPES,
  MAX_FILE_SIZE,
  type GeminiModelId,
  type AllowedMimeType,
} from './config.js';

// Circuit Breaker
export {
  CircuitBreaker,
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
} from './circuit-breaker.js';
