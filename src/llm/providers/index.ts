/**
 * Generation backends - Export all provider implementations
 */

export { BaseBackend } from './base.js';
export { OpenAIBackend, type OpenAIBackendConfig } from './openai.js';
export {
  LocalModelBackend,
  DEFAULT_LOCAL_URL,
  parseLocalResponse,
  serializeLocalRequest,
  type LocalChatRequest,
  type LocalModelBackendConfig,
} from './local.js';
export { AnthropicBackend, type AnthropicBackendConfig } from './anthropic.js';
