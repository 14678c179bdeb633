/**
 * AnthropicBackend - Anthropic Messages API implementation
 * Based on official @anthropic-ai/sdk
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseBackend } from './base.js';
import type { BackendProvider, Env, GenerationRequest } from '../types.js';
import { MissingCredentialError } from '../../commit/errors.js';

/**
 * Anthropic-specific configuration
 */
export interface AnthropicBackendConfig {
  apiKey: string;
  /** Custom base URL (for proxies) */
  baseURL?: string;
}

/**
 * AnthropicBackend - Implementation for Anthropic Claude API
 * Supports custom baseURL for proxy services
 */
export class AnthropicBackend extends BaseBackend {
  readonly name: BackendProvider = 'anthropic';

  private client: Anthropic;

  constructor(config: AnthropicBackendConfig) {
    super();
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });
  }

  /**
   * Create backend from environment variables
   *
   * @throws {MissingCredentialError} If ANTHROPIC_API_KEY is not set
   */
  static fromEnv(env: Env = process.env): AnthropicBackend {
    const apiKey = env['ANTHROPIC_API_KEY'];
    if (!apiKey) {
      throw new MissingCredentialError('ANTHROPIC_API_KEY');
    }

    return new AnthropicBackend({
      apiKey,
      baseURL: env['ANTHROPIC_BASE_URL'] || undefined,
    });
  }

  protected async complete(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.client.messages
      .create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          // The Messages API caps temperature at 1
          temperature: Math.min(request.temperature, 1),
          messages: [
            {
              role: 'user',
              content: request.promptText,
            },
          ],
        },
        { signal }
      )
      .catch((error: unknown) => {
        const status = error instanceof Anthropic.APIError ? error.status : undefined;
        const message = error instanceof Error ? error.message : String(error);
        throw this.fail(`error generating with Anthropic: ${message}`, error, status);
      });

    // Extract text content from response
    const textContent = response.content.find((block) => block.type === 'text');
    if (textContent?.type !== 'text') {
      throw this.fail('error generating with Anthropic: response contained no text block');
    }
    return textContent.text;
  }
}
