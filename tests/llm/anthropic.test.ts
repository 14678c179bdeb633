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

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    static APIError = mocks.MockAPIError;
    messages = { create: mocks.create };
    constructor(options: unknown) {
      mocks.constructed.push(options);
    }
  },
}));

import { AnthropicBackend } from '../../src/llm/providers/anthropic.js';
import { BackendError, MissingCredentialError } from '../../src/commit/errors.js';
import type { GenerationParams } from '../../src/llm/types.js';

const params: GenerationParams = {
  model: 'claude-3-5-haiku-latest',
  maxTokens: 300,
  temperature: 0.7,
};

describe('AnthropicBackend', () => {
  beforeEach(() => {
    mocks.create.mockReset();
    mocks.constructed.length = 0;
  });

  it('should fail without ANTHROPIC_API_KEY', () => {
    expect(() => AnthropicBackend.fromEnv({})).toThrow(MissingCredentialError);
    expect(mocks.constructed).toHaveLength(0);
  });

  it('should create the client with SDK retries disabled', () => {
    AnthropicBackend.fromEnv({ ANTHROPIC_API_KEY: 'test-api-key' });

    expect(mocks.constructed).toEqual([
      { apiKey: 'test-api-key', baseURL: undefined, maxRetries: 0 },
    ]);
  });

  it('should return the first text block', async () => {
    mocks.create.mockResolvedValue({
      content: [
        { type: 'tool_use', id: 't1', name: 'noop', input: {} },
        { type: 'text', text: 'docs: update readme' },
      ],
    });
    const backend = AnthropicBackend.fromEnv({ ANTHROPIC_API_KEY: 'test-api-key' });

    const text = await backend.generate('the prompt', params);

    expect(text).toBe('docs: update readme');
    expect(mocks.create).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-haiku-latest',
        max_tokens: 300,
        temperature: 0.7,
        messages: [{ role: 'user', content: 'the prompt' }],
      },
      { signal: undefined }
    );
  });

  it('should cap temperature at 1', async () => {
    mocks.create.mockResolvedValue({ content: [{ type: 'text', text: 'fix: x' }] });
    const backend = AnthropicBackend.fromEnv({ ANTHROPIC_API_KEY: 'test-api-key' });

    await backend.generate('p', { ...params, temperature: 1.6 });

    expect(mocks.create.mock.calls[0]?.[0]).toMatchObject({ temperature: 1 });
  });

  it('should wrap API errors with their status', async () => {
    mocks.create.mockRejectedValue(new mocks.MockAPIError(529, 'overloaded'));
    const backend = AnthropicBackend.fromEnv({ ANTHROPIC_API_KEY: 'test-api-key' });

    const error = await backend.generate('p', params).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error instanceof BackendError && error.message).toBe(
      'error generating with Anthropic: overloaded'
    );
    expect(error instanceof BackendError && error.status).toBe(529);
  });

  it('should fail when there is no text block', async () => {
    mocks.create.mockResolvedValue({ content: [] });
    const backend = AnthropicBackend.fromEnv({ ANTHROPIC_API_KEY: 'test-api-key' });

    await expect(backend.generate('p', params)).rejects.toThrow(
      'error generating with Anthropic: response contained no text block'
    );
  });
});
