/**
 * LocalModelBackend - Ollama-compatible chat endpoint
 */

import { z } from 'zod';
import { BaseBackend } from './base.js';
import { errorMessage } from '../../utils/index.js';
import type { BackendProvider, ChatMessage, GenerationRequest } from '../types.js';

/**
 * Default chat endpoint of a local Ollama server
 */
export const DEFAULT_LOCAL_URL = 'http://localhost:11434/api/chat';

/**
 * Request body sent to the local endpoint
 */
export interface LocalChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

const LocalChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

/**
 * Local backend configuration
 */
export interface LocalModelBackendConfig {
  url?: string;
}

/**
 * Serialize the request body
 *
 * Key order is fixed: model, messages, temperature.
 */
export function serializeLocalRequest(request: GenerationRequest): string {
  const body: LocalChatRequest = {
    model: request.model,
    messages: [{ role: 'user', content: request.promptText }],
    temperature: request.temperature,
  };
  return JSON.stringify(body);
}

/**
 * Extract the message content from a response body
 *
 * Accepts a single `{message:{content}}` object, or the newline-delimited
 * stream of such objects that Ollama sends when streaming is left on, in
 * which case the chunks are concatenated.
 *
 * @returns Content, or null if the body has neither shape
 */
export function parseLocalResponse(body: string): string | null {
  const single = parseChunk(body);
  if (single !== null) {
    return single;
  }

  const lines = body.split('\n').filter((line) => line.trim() !== '');
  if (lines.length < 2) {
    return null;
  }

  let content = '';
  for (const line of lines) {
    const chunk = parseChunk(line);
    if (chunk === null) {
      return null;
    }
    content += chunk;
  }
  return content;
}

function parseChunk(text: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = LocalChatResponseSchema.safeParse(json);
  return parsed.success ? parsed.data.message.content : null;
}

/**
 * LocalModelBackend - talks to a model server on the local network interface
 */
export class LocalModelBackend extends BaseBackend {
  readonly name: BackendProvider = 'local';
  readonly url: string;

  constructor(config: LocalModelBackendConfig = {}) {
    super();
    this.url = config.url || DEFAULT_LOCAL_URL;
  }

  protected async complete(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: serializeLocalRequest(request),
        signal,
      });
    } catch (error) {
      throw this.fail(`error making request to local model: ${errorMessage(error)}`, error);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.fail(`error reading response: ${errorMessage(error)}`, error, response.status);
    }

    if (!response.ok) {
      throw this.fail(
        `local model returned ${response.status}: ${body.slice(0, 200)}`,
        undefined,
        response.status
      );
    }

    const content = parseLocalResponse(body);
    if (content === null) {
      throw this.fail(
        `error unmarshaling response: expected {"message":{"content":string}}, got ${body.slice(0, 200)}`,
        undefined,
        response.status
      );
    }
    return content;
  }
}
