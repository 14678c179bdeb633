/**
 * OpenAIBackend - OpenAI chat completions implementation
 * Based on official openai SDK
 */

import OpenAI from 'openai';
import { BaseBackend } from './base.js';
import type { BackendProvider, Env, GenerationRequest } from '../types.js';
import { MissingCredentialError } from '../../commit/errors.js';

/**
 * OpenAI-specific configuration
 */
export interface OpenAIBackendConfig {
  apiKey: string;
  /** Custom base URL (for proxies and compatible servers) */
  baseURL?: string;
}

/**
 * OpenAIBackend - Implementation for the hosted OpenAI API
 *
 * The SDK's own retry loop is disabled; the retry orchestrator owns retries.
 */
export class OpenAIBackend extends BaseBackend {
  readonly name: BackendProvider = 'openai';

  private client: OpenAI;

  constructor(config: OpenAIBackendConfig) {
    super();
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });
  }

  /**
   * Create backend from environment variables
   *
   * @throws {MissingCredentialError} If OPENAI_API_KEY is not set
   */
  static fromEnv(env: Env = process.env): OpenAIBackend {
    const apiKey = env['OPENAI_API_KEY'];
    if (!apiKey) {
      throw new MissingCredentialError('OPENAI_API_KEY');
    }

    return new OpenAIBackend({
      apiKey,
      baseURL: env['OPENAI_BASE_URL'] || undefined,
    });
  }

  protected async complete(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions
      .create(
        {
          model: request.model,
          messages: [{ role: 'user', content: request.promptText }],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { signal }
      )
      .catch((error: unknown) => {
        const status = error instanceof OpenAI.APIError ? error.status : undefined;
        const message = error instanceof Error ? error.message : String(error);
        throw this.fail(`error generating with OpenAI: ${message}`, error, status);
      });

    const content = response.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw this.fail('error generating with OpenAI: response contained no completion');
    }
    return content;
  }
}
