/**
 * Commit pipeline type definitions
 */

import type { FormatError, ScribeError } from './errors.js';

/**
 * Instruction set the prompt asks the model to follow
 */
export type CommitStyle = 'conventional' | 'detailed' | 'custom';

/**
 * Commit-message style policy, derived from configuration and read-only
 * for the length of a pipeline run
 */
export interface StylePolicy {
  readonly style: CommitStyle;
  /** Allowed conventional commit types, in prompt order */
  readonly allowedTypePrefixes: readonly string[];
  /** Subject must carry a `(scope)` after the type */
  readonly scopeRequired: boolean;
  /** Ask the model for a BREAKING CHANGE section when relevant */
  readonly breakingChangeAllowed: boolean;
  readonly maxSubjectLength: number;
  /** Append the branch ticket id to the message */
  readonly ticketIntegration: boolean;
  /** Run the conventional-format validator */
  readonly verifyFormat: boolean;
}

/**
 * Options for the post-processing stages that do not come from the style policy
 */
export interface PostProcessOptions {
  /** Entries for `Co-authored-by:` trailers, in order */
  coAuthors: readonly string[];
  emojisEnabled: boolean;
}

/**
 * Result of format validation
 */
export type ValidationResult = { ok: true } | { ok: false; error: FormatError };

/**
 * Result of the whole pipeline
 */
export type PipelineResult =
  | { ok: true; message: string; attempts: number }
  | { ok: false; error: ScribeError };
