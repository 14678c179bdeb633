/**
 * Backend factory - creates generation backends based on configuration
 */

import type { BackendOptions, BackendProvider, Env, GenerationBackend } from './types.js';
import { AnthropicBackend, LocalModelBackend, OpenAIBackend } from './providers/index.js';
import { ConfigError } from '../commit/errors.js';

/**
 * Registry of available backends
 */
const backendRegistry: Record<
  BackendProvider,
  (options: BackendOptions, env: Env) => GenerationBackend
> = {
  openai: (_options, env) => OpenAIBackend.fromEnv(env),
  local: (options) => new LocalModelBackend({ url: options.localUrl }),
  anthropic: (_options, env) => AnthropicBackend.fromEnv(env),
};

/**
 * Check whether a string names a known backend
 */
export function isBackendProvider(value: string): value is BackendProvider {
  return Object.prototype.hasOwnProperty.call(backendRegistry, value);
}

/**
 * Create the backend selected by configuration
 *
 * Hosted backends read their credential from `env` here, so a missing key is
 * reported before any request is made.
 *
 * @throws {MissingCredentialError} If the hosted backend's key is absent
 * @throws {ConfigError} If the provider is unknown
 */
export function createBackend(options: BackendOptions, env: Env = process.env): GenerationBackend {
  const provider: string = options.provider;
  if (!isBackendProvider(provider)) {
    throw new ConfigError(
      `unsupported provider: ${provider}. Available providers: ${getAvailableProviders().join(', ')}`
    );
  }
  return backendRegistry[provider](options, env);
}

/**
 * Get list of available provider names
 */
export function getAvailableProviders(): BackendProvider[] {
  return Object.keys(backendRegistry).filter(isBackendProvider);
}
