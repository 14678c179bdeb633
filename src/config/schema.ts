/**
 * Configuration schema
 *
 * Every key has a default, so an empty or partial file is a valid config.
 */

import { z } from 'zod';
import { DEFAULT_COMMIT_TYPES, DEFAULT_MAX_SUBJECT_LENGTH } from '../commit/constants.js';
import type { StylePolicy } from '../commit/types.js';
import { DEFAULT_LOCAL_URL } from '../llm/providers/local.js';

export const AIConfigSchema = z.object({
  provider: z.enum(['openai', 'local', 'anthropic']).default('local'),
  model: z.string().min(1).default('llama2'),
  maxTokens: z.number().int().positive().default(500),
  temperature: z.number().min(0).max(2).default(0.7),
  local: z
    .object({
      url: z.string().url().default(DEFAULT_LOCAL_URL),
    })
    .default({}),
});

export const CommitConfigSchema = z.object({
  style: z.enum(['conventional', 'detailed', 'custom']).default('conventional'),
  /** Require `(scope)` after the type */
  scopeRequired: z.boolean().default(false),
  /** Ask for a BREAKING CHANGE section */
  breaking: z.boolean().default(true),
  maxLength: z.number().int().positive().default(DEFAULT_MAX_SUBJECT_LENGTH),
  types: z.array(z.string().min(1)).min(1).default([...DEFAULT_COMMIT_TYPES]),
  /** Tag the message with the ticket id from the branch name */
  ticket: z.boolean().default(true),
  coAuthors: z.array(z.string().min(1)).default([]),
  /** GPG-sign commits */
  sign: z.boolean().default(false),
  emojis: z.boolean().default(false),
  /** Validate conventional format before committing */
  verify: z.boolean().default(true),
});

export const SystemConfigSchema = z.object({
  maxRetries: z.number().int().min(1).default(3),
  /** Seconds between attempts */
  retryDelay: z.number().min(0).default(2),
  /** Seconds per attempt */
  timeout: z.number().positive().default(30),
  hooksPath: z.string().min(1).default('.git/hooks'),
  ignorePaths: z.array(z.string()).default(['.env', '*.lock', 'node_modules/']),
});

export const DisplayConfigSchema = z.object({
  debug: z.boolean().default(false),
  colorMode: z.enum(['auto', 'always', 'never']).default('auto'),
  showDiff: z.boolean().default(true),
  quiet: z.boolean().default(false),
  diffFormat: z.enum(['unified', 'minimal', 'patience']).default('unified'),
});

export const ConfigSchema = z.object({
  ai: AIConfigSchema.default({}),
  commit: CommitConfigSchema.default({}),
  system: SystemConfigSchema.default({}),
  display: DisplayConfigSchema.default({}),
});

export type ScribeConfig = z.infer<typeof ConfigSchema>;
export type AIConfig = z.infer<typeof AIConfigSchema>;
export type CommitConfig = z.infer<typeof CommitConfigSchema>;
export type SystemConfig = z.infer<typeof SystemConfigSchema>;
export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;

/**
 * Configuration with every default applied
 */
export function defaultConfig(): ScribeConfig {
  return ConfigSchema.parse({});
}

/**
 * Derive the style policy the pipeline reads
 */
export function toStylePolicy(config: ScribeConfig): StylePolicy {
  return {
    style: config.commit.style,
    allowedTypePrefixes: [...config.commit.types],
    scopeRequired: config.commit.scopeRequired,
    breakingChangeAllowed: config.commit.breaking,
    maxSubjectLength: config.commit.maxLength,
    ticketIntegration: config.commit.ticket,
    verifyFormat: config.commit.verify,
  };
}
