/**
 * Generation backend layer
 * Provides a single `generate` capability over several text-generation services
 *
 * Usage:
 * ```typescript
 * import { createBackend } from './llm/index.js';
 *
 * const backend = createBackend({ provider: 'local', localUrl: DEFAULT_LOCAL_URL });
 * const text = await backend.generate(prompt, { model: 'llama2', maxTokens: 500, temperature: 0.7 });
 * ```
 */

export type {
  BackendOptions,
  BackendProvider,
  ChatMessage,
  Env,
  GenerationBackend,
  GenerationParams,
  GenerationRequest,
} from './types.js';

export {
  BaseBackend,
  OpenAIBackend,
  LocalModelBackend,
  AnthropicBackend,
  DEFAULT_LOCAL_URL,
  parseLocalResponse,
  serializeLocalRequest,
  type OpenAIBackendConfig,
  type LocalModelBackendConfig,
  type LocalChatRequest,
  type AnthropicBackendConfig,
} from './providers/index.js';

export { createBackend, getAvailableProviders, isBackendProvider } from './factory.js';
