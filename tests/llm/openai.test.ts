import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      readonly status: number,
      message: string
    ) {
      super(message);
    }
  }
  const constructed: unknown[] = [];
  return {
    create: vi.fn(),
    constructed,
    MockAPIError,
  };
});

vi.mock('openai', () => ({
  default: class {
    static APIError = mocks.MockAPIError;
    chat = { completions: { create: mocks.create } };
    constructor(options: unknown) {
      mocks.constructed.push(options);
    }
  },
}));

import { OpenAIBackend } from '../../src/llm/providers/openai.js';
import { BackendError, MissingCredentialError } from '../../src/commit/errors.js';
import type { GenerationParams } from '../../src/llm/types.js';

const params: GenerationParams = { model: 'gpt-4o-mini', maxTokens: 500, temperature: 0.7 };

describe('OpenAIBackend', () => {
  beforeEach(() => {
    mocks.create.mockReset();
    mocks.constructed.length = 0;
  });

  describe('fromEnv', () => {
    it('should fail without OPENAI_API_KEY and create no client', () => {
      expect(() => OpenAIBackend.fromEnv({})).toThrow(MissingCredentialError);
      expect(() => OpenAIBackend.fromEnv({ OPENAI_API_KEY: '' })).toThrow(
        'OPENAI_API_KEY environment variable not set'
      );
      expect(mocks.constructed).toHaveLength(0);
    });

    it('should disable SDK retries and pass the base URL', () => {
      OpenAIBackend.fromEnv({ OPENAI_API_KEY: 'test-api-key' });
      OpenAIBackend.fromEnv({
        OPENAI_API_KEY: 'test-api-key',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
      });

      expect(mocks.constructed).toEqual([
        { apiKey: 'test-api-key', baseURL: undefined, maxRetries: 0 },
        { apiKey: 'test-api-key', baseURL: 'http://localhost:8080/v1', maxRetries: 0 },
      ]);
    });
  });

  describe('generate', () => {
    it('should send one user message with the configured parameters', async () => {
      mocks.create.mockResolvedValue({ choices: [{ message: { content: 'feat: add login' } }] });
      const controller = new AbortController();
      const backend = OpenAIBackend.fromEnv({ OPENAI_API_KEY: 'test-api-key' });

      const text = await backend.generate('the prompt', params, controller.signal);

      expect(text).toBe('feat: add login');
      expect(mocks.create).toHaveBeenCalledWith(
        {
          model: 'gpt-4o-mini',
          messages: [{ role: 'user', content: 'the prompt' }],
          max_tokens: 500,
          temperature: 0.7,
        },
        { signal: controller.signal }
      );
    });

    it('should wrap API errors with their status', async () => {
      mocks.create.mockRejectedValue(new mocks.MockAPIError(429, 'rate limited'));
      const backend = OpenAIBackend.fromEnv({ OPENAI_API_KEY: 'test-api-key' });

      const error = await backend.generate('p', params).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error instanceof BackendError && error.message).toBe(
        'error generating with OpenAI: rate limited'
      );
      expect(error instanceof BackendError && error.status).toBe(429);
      expect(error instanceof BackendError && error.retryable).toBe(true);
    });

    it('should wrap transport errors without a status', async () => {
      mocks.create.mockRejectedValue(new Error('fetch failed'));
      const backend = OpenAIBackend.fromEnv({ OPENAI_API_KEY: 'test-api-key' });

      const error = await backend.generate('p', params).catch((e: unknown) => e);

      expect(error instanceof BackendError && error.message).toBe(
        'error generating with OpenAI: fetch failed'
      );
      expect(error instanceof BackendError && error.status).toBeUndefined();
    });

    it('should fail when the response has no completion', async () => {
      mocks.create.mockResolvedValue({ choices: [] });
      const backend = OpenAIBackend.fromEnv({ OPENAI_API_KEY: 'test-api-key' });

      await expect(backend.generate('p', params)).rejects.toThrow(
        'error generating with OpenAI: response contained no completion'
      );
    });
  });
});
