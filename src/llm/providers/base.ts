/**
 * BaseBackend - Abstract base class for generation backends
 * Implements request construction and error normalization shared by providers
 */

import type {
  BackendProvider,
  GenerationBackend,
  GenerationParams,
  GenerationRequest,
} from '../types.js';
import { BackendError, ConfigError, ScribeError } from '../../commit/errors.js';

/**
 * Abstract base class for all generation backends
 */
export abstract class BaseBackend implements GenerationBackend {
  abstract readonly name: BackendProvider;

  /**
   * Send one request - to be implemented by providers
   */
  protected abstract complete(request: GenerationRequest, signal?: AbortSignal): Promise<string>;

  /**
   * Generate text, wrapping any provider failure in a BackendError
   */
  async generate(
    promptText: string,
    params: GenerationParams,
    signal?: AbortSignal
  ): Promise<string> {
    const request = this.buildRequest(promptText, params);

    try {
      return await this.complete(request, signal);
    } catch (error) {
      if (error instanceof ScribeError) {
        throw error;
      }
      throw this.fail(
        `error generating with ${this.name}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  /**
   * Build and check a request
   *
   * @throws {ConfigError} If token limit or temperature is out of range
   */
  protected buildRequest(promptText: string, params: GenerationParams): GenerationRequest {
    if (!Number.isInteger(params.maxTokens) || params.maxTokens <= 0) {
      throw new ConfigError(`maxTokens must be a positive integer, got ${params.maxTokens}`);
    }
    if (!(params.temperature >= 0 && params.temperature <= 2)) {
      throw new ConfigError(`temperature must be between 0 and 2, got ${params.temperature}`);
    }

    return {
      promptText,
      model: params.model,
      maxTokens: params.maxTokens,
      temperature: params.temperature,
    };
  }

  /**
   * Create a BackendError tagged with this provider
   */
  protected fail(message: string, cause?: unknown, status?: number): BackendError {
    return new BackendError(message, this.name, { cause, status });
  }
}
