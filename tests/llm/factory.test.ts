import { describe, it, expect } from 'vitest';
import { createBackend, getAvailableProviders, isBackendProvider } from '../../src/llm/factory.js';
import {
  AnthropicBackend,
  LocalModelBackend,
  OpenAIBackend,
} from '../../src/llm/providers/index.js';
import { MissingCredentialError } from '../../src/commit/errors.js';

const localUrl = 'http://localhost:11434/api/chat';

describe('createBackend', () => {
  it('should create the local backend without credentials', () => {
    const backend = createBackend({ provider: 'local', localUrl: 'http://10.0.0.5:11434/api/chat' }, {});

    expect(backend).toBeInstanceOf(LocalModelBackend);
    expect(backend.name).toBe('local');
    expect(backend instanceof LocalModelBackend && backend.url).toBe(
      'http://10.0.0.5:11434/api/chat'
    );
  });

  it('should create hosted backends when their key is set', () => {
    expect(
      createBackend({ provider: 'openai', localUrl }, { OPENAI_API_KEY: 'test-api-key' })
    ).toBeInstanceOf(OpenAIBackend);
    expect(
      createBackend({ provider: 'anthropic', localUrl }, { ANTHROPIC_API_KEY: 'test-api-key' })
    ).toBeInstanceOf(AnthropicBackend);
  });

  it('should fail for a hosted backend without its key', () => {
    expect(() => createBackend({ provider: 'openai', localUrl }, {})).toThrow(
      MissingCredentialError
    );
    expect(() =>
      createBackend({ provider: 'anthropic', localUrl }, { OPENAI_API_KEY: 'test-api-key' })
    ).toThrow('ANTHROPIC_API_KEY environment variable not set');
  });
});

describe('isBackendProvider', () => {
  it('should accept only known providers', () => {
    expect(isBackendProvider('openai')).toBe(true);
    expect(isBackendProvider('local')).toBe(true);
    expect(isBackendProvider('anthropic')).toBe(true);
    expect(isBackendProvider('gemini')).toBe(false);
    expect(isBackendProvider('toString')).toBe(false);
  });
});

describe('getAvailableProviders', () => {
  it('should list every registered provider', () => {
    expect(getAvailableProviders()).toEqual(['openai', 'local', 'anthropic']);
  });
});
