/**
 * Generation backend type definitions
 * Using Strategy Pattern for multi-provider support
 */

/**
 * Supported generation backends
 */
export type BackendProvider = 'openai' | 'local' | 'anthropic';

/**
 * Environment variables a backend may read its credential from
 */
export type Env = Record<string, string | undefined>;

/**
 * Per-request generation parameters taken from configuration
 */
export interface GenerationParams {
  model: string;
  /** Completion token limit (> 0) */
  maxTokens: number;
  /** Sampling temperature in [0, 2] */
  temperature: number;
}

/**
 * A single generation request, built fresh for every attempt
 */
export interface GenerationRequest extends GenerationParams {
  promptText: string;
}

/**
 * Chat message structure shared by the chat-style backends
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Settings needed to construct a backend
 */
export interface BackendOptions {
  provider: BackendProvider;
  /** Chat endpoint of the local model server */
  localUrl: string;
}

/**
 * GenerationBackend Interface - Strategy Pattern
 * All backends must implement this interface
 */
export interface GenerationBackend {
  readonly name: BackendProvider;

  /**
   * Generate text for a prompt
   *
   * @param promptText - Full prompt, sent as a single user message
   * @param params - Model, token limit and temperature
   * @param signal - Aborts the in-flight request when the deadline fires
   * @returns Generated text
   * @throws {BackendError} On transport, status or response-shape failure
   */
  generate(promptText: string, params: GenerationParams, signal?: AbortSignal): Promise<string>;
}
