/**
 * Environment configuration for commit-scribe
 *
 * Priority order (highest to lowest):
 * 1. Command-line flags (--provider, --model)
 * 2. SCRIBE_PROVIDER / SCRIBE_MODEL
 * 3. Config file
 *
 * Backend credentials are only ever read from the environment.
 */

import type { ScribeConfig } from './schema.js';
import type { BackendProvider, Env } from '../llm/types.js';
import { isBackendProvider } from '../llm/factory.js';
import { ConfigError } from '../commit/errors.js';

/**
 * Overrides given on the command line
 */
export interface ConfigOverrides {
  provider?: string;
  model?: string;
  debug?: boolean;
}

/**
 * Environment variable holding each hosted backend's credential
 */
export const CREDENTIAL_VARIABLES: Readonly<Record<BackendProvider, string | undefined>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  local: undefined,
};

/**
 * Apply environment and command-line overrides to a loaded config
 *
 * @throws {ConfigError} If an override names an unknown provider
 */
export function applyOverrides(
  config: ScribeConfig,
  overrides: ConfigOverrides = {},
  env: Env = process.env
): ScribeConfig {
  const requested = overrides.provider || env['SCRIBE_PROVIDER'];
  const model = overrides.model || env['SCRIBE_MODEL'];

  let provider: BackendProvider = config.ai.provider;
  if (requested) {
    if (!isBackendProvider(requested)) {
      throw new ConfigError(`unsupported provider: ${requested}`);
    }
    provider = requested;
  }

  return {
    ...config,
    ai: {
      ...config.ai,
      provider,
      model: model || config.ai.model,
    },
    display: {
      ...config.display,
      debug: overrides.debug || config.display.debug,
    },
  };
}

/**
 * Whether the selected backend's credential is present
 */
export function hasCredential(provider: BackendProvider, env: Env = process.env): boolean {
  const variable = CREDENTIAL_VARIABLES[provider];
  return variable === undefined || Boolean(env[variable]);
}

/**
 * Mask API key for display
 */
export function maskApiKey(key: string): string {
  if (key.length <= 12) {
    return '***';
  }
  return key.slice(0, 8) + '...' + key.slice(-4);
}
