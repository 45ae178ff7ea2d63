/**
 * Unit tests for Gemini Client
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

const genai = vi.hoisted(() => ({
  generateContent: vi.fn(),
  getGenerativeModel: vi.fn(),
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel(params: { model: string }) {
      genai.getGenerativeModel(params);
      return { generateContent: genai.generateContent };
    }
  },
}));

import {
  GeminiClient,
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  loadGeminiConfig,
  GEMINI_MODELS,
  GENERATION_PRESETS,
} from '../../../src/services/gemini/index.js';

function sdkResult(text: string) {
  return {
    response: {
      text: () => text,
      usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 8, totalTokenCount: 20 },
    },
  };
}

const FAST_RETRY = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

describe('Gemini Config', () => {
  it('should have correct model IDs', () => {
    expect(GEMINI_MODELS.FLASH_2).toBe('gemini-2.0-flash');
    expect(GEMINI_MODELS.FLASH_25).toBe('gemini-2.5-flash');
    expect(GEMINI_MODELS.PRO).toBe('gemini-2.5-pro');
  });

  it('should load config with deterministic defaults', () => {
    const config = loadGeminiConfig({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25 });

    expect(config.apiKey).toBe('test-key');
    expect(config.temperature).toBe(0);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10000 });
    expect(config.circuitBreaker).toEqual({ failureThreshold: 5, recoveryTimeMs: 60000 });
  });

  it('should reject a missing API key', () => {
    expect(() => loadGeminiConfig({ apiKey: '' })).toThrow('GEMINI_API_KEY is required');
  });
});

describe('GeminiClient', () => {
  beforeEach(() => {
    genai.generateContent.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('should send a text prompt with the text preset', async () => {
    genai.generateContent.mockResolvedValueOnce(sdkResult('Node(id=\'a\', type=\'X\')'));
    const client = new GeminiClient({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25 });

    const response = await client.generateText('Extract a graph');

    expect(response.text).toBe("Node(id='a', type='X')");
    expect(response.usage).toEqual({ inputTokens: 12, outputTokens: 8, totalTokens: 20 });
    expect(response.model).toBe('gemini-2.5-flash');
    expect(genai.generateContent).toHaveBeenCalledWith({
      contents: [{ role: 'user', parts: [{ text: 'Extract a graph' }] }],
      generationConfig: { ...GENERATION_PRESETS.text },
    });
  });

  it('should send the PDF inline before the prompt', async () => {
    genai.generateContent.mockResolvedValueOnce(sdkResult('{"title":"Gout"}'));
    const client = new GeminiClient({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25 });

    await client.analyzePDF('Read it', { mimeType: 'application/pdf', data: 'JVBERi0=', sizeBytes: 5 });

    expect(genai.generateContent).toHaveBeenCalledWith({
      contents: [
        {
          role: 'user',
          parts: [{ inlineData: { mimeType: 'application/pdf', data: 'JVBERi0=' } }, { text: 'Read it' }],
        },
      ],
      generationConfig: { ...GENERATION_PRESETS.json },
    });
  });

  it('should refuse a non-PDF file reference', async () => {
    const client = new GeminiClient({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25 });

    await expect(
      client.analyzePDF('Read it', { mimeType: 'text/plain', data: 'aGk=', sizeBytes: 2 })
    ).rejects.toThrow('File must be a PDF (application/pdf)');
  });

  it('should retry a transient failure', async () => {
    genai.generateContent
      .mockRejectedValueOnce(new Error('503 Service Unavailable'))
      .mockResolvedValueOnce(sdkResult('ok'));
    const client = new GeminiClient({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25, retry: FAST_RETRY });

    const response = await client.generateText('hello');

    expect(response.text).toBe('ok');
    expect(genai.generateContent).toHaveBeenCalledTimes(2);
  });

  it('should give up after the last attempt with the last error', async () => {
    genai.generateContent.mockRejectedValue(new Error('500 Internal'));
    const client = new GeminiClient({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25, retry: FAST_RETRY });

    await expect(client.generateText('hello')).rejects.toThrow('500 Internal');
    expect(genai.generateContent).toHaveBeenCalledTimes(3);
  });

  it('should not retry a context length failure', async () => {
    genai.generateContent.mockRejectedValue(new Error('Input exceeds context length'));
    const client = new GeminiClient({ apiKey: 'test-key', model: GEMINI_MODELS.FLASH_25, retry: FAST_RETRY });

    await expect(client.generateText('huge')).rejects.toThrow(
      'Context length exceeded. Split the document text before extraction.'
    );
    expect(genai.generateContent).toHaveBeenCalledTimes(1);
  });

  describe('fileRefFromPath', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docgraph-gemini-'));
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('should base64-encode a PDF', async () => {
      const filePath = path.join(testDir, '354.pdf');
      await fs.writeFile(filePath, '%PDF');

      expect(GeminiClient.fileRefFromPath(filePath)).toEqual({
        mimeType: 'application/pdf',
        data: 'JVBERg==',
        sizeBytes: 4,
      });
    });

    it('should reject unsupported formats', () => {
      expect(() => GeminiClient.fileRefFromPath('/docs/scan.docx')).toThrow(
        "Unsupported document format: 'docx' (file: scan.docx). Accepted: pdf, txt"
      );
    });
  });
});

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    breaker = new CircuitBreaker({
      name: 'TestBreaker',
      failureThreshold: 3,
      recoveryTimeMs: 1000,
      halfOpenSuccessThreshold: 2,
    });
  });

  async function failOnce(): Promise<void> {
    await breaker
      .execute(async () => {
        throw new Error('fail');
      })
      .catch(() => undefined);
  }

  it('should start in CLOSED state', () => {
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should open after threshold failures', async () => {
    for (let i = 0; i < 3; i++) await failOnce();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('should reset the failure count on success', async () => {
    await failOnce();
    await failOnce();
    await breaker.execute(async () => 'ok');
    await failOnce();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStatus().failureCount).toBe(1);
  });

  it('should reject calls while open', async () => {
    breaker.forceOpen();

    await expect(breaker.execute(async () => 'never')).rejects.toBeInstanceOf(CircuitBreakerOpenError);
  });

  it('should close again after successful probes', async () => {
    vi.useFakeTimers();
    try {
      breaker.forceOpen();
      vi.advanceTimersByTime(1000);

      await breaker.execute(async () => 'probe 1');
      expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
      await breaker.execute(async () => 'probe 2');
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should reopen when a probe fails', async () => {
    vi.useFakeTimers();
    try {
      breaker.forceOpen();
      vi.advanceTimersByTime(1000);

      await failOnce();
      expect(breaker.getState()).toBe(CircuitState.OPEN);
    } finally {
      vi.useRealTimers();
    }
  });
});
