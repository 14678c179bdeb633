/**
 * Commit message pipeline
 */

export {
  CommitMessageGenerator,
  generateCommitMessage,
  type GeneratorOptions,
} from './generator.js';
export { buildPrompt, buildStyleRules, countLanguages } from './prompts.js';
export { runWithRetry, type AttemptFailure, type GenerateFn, type RetryOptions, type RetryOutcome } from './retry.js';
export {
  postProcess,
  tagTicket,
  appendCoAuthors,
  decorateWithEmoji,
  enforceSubjectLength,
  normalizeGeneratedText,
} from './post-processor.js';
export { validateConventional, buildConventionalPattern, shouldValidate } from './validator.js';
export { CommitHistory, getHistoryPath, type CommitRecord } from './history.js';
export * from './errors.js';
export type {
  CommitStyle,
  PipelineResult,
  PostProcessOptions,
  StylePolicy,
  ValidationResult,
} from './types.js';
