/**
 * Commit message generator
 *
 * Runs the pipeline for one change set:
 * empty-set guard → backend → prompt → retry/timeout → post-process → validate.
 * Every outcome, success or failure, is returned as a PipelineResult.
 */

import type { ChangeSet } from '../git/type.js';
import { createBackend, type Env, type GenerationBackend, type GenerationParams } from '../llm/index.js';
import type { ScribeConfig } from '../config/schema.js';
import { toStylePolicy } from '../config/schema.js';
import type { IProgressPrinter } from '../cli/progress.js';
import { nullProgressPrinter } from '../cli/progress.js';
import type { PipelineResult, StylePolicy } from './types.js';
import { EmptyChangeSetError, toScribeError } from './errors.js';
import { buildPrompt } from './prompts.js';
import { runWithRetry, type AttemptFailure } from './retry.js';
import { normalizeGeneratedText, postProcess } from './post-processor.js';
import { shouldValidate, validateConventional } from './validator.js';

/**
 * Generator options
 */
export interface GeneratorOptions {
  config: ScribeConfig;
  /** Backend to use instead of the one the config selects */
  backend?: GenerationBackend;
  /** Environment the backend reads credentials from (default: process.env) */
  env?: Env;
  /** External cancellation */
  signal?: AbortSignal;
  /** Progress output (default: silent) */
  progress?: IProgressPrinter;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Commit message generator
 */
export class CommitMessageGenerator {
  private readonly config: ScribeConfig;
  private readonly policy: StylePolicy;
  private readonly progress: IProgressPrinter;

  constructor(private readonly options: GeneratorOptions) {
    this.config = options.config;
    this.policy = toStylePolicy(options.config);
    this.progress = options.progress ?? nullProgressPrinter;
  }

  /**
   * Generate a message for the staged changes
   */
  async generate(changeSet: ChangeSet): Promise<PipelineResult> {
    if (changeSet.files.length === 0) {
      return { ok: false, error: new EmptyChangeSetError() };
    }

    let backend: GenerationBackend;
    try {
      backend = this.resolveBackend();
    } catch (error) {
      return { ok: false, error: toScribeError(error, this.config.ai.provider) };
    }

    const prompt = buildPrompt(changeSet, this.policy);
    this.progress.debug(`Prompt (${prompt.length} chars):\n${prompt}`);

    const params: GenerationParams = {
      model: this.config.ai.model,
      maxTokens: this.config.ai.maxTokens,
      temperature: this.config.ai.temperature,
    };

    this.progress.progress(`Generating commit message with ${backend.name} (${params.model})...`);
    const outcome = await runWithRetry(
      {
        maxAttempts: this.config.system.maxRetries,
        retryDelay: this.config.system.retryDelay,
        timeout: this.config.system.timeout,
        signal: this.options.signal,
        verbose: this.options.verbose,
        label: backend.name,
        onAttemptFailed: (failure) => this.reportFailure(failure),
      },
      (signal) => backend.generate(prompt, params, signal)
    );

    if (!outcome.ok) {
      this.progress.done(false, 'Generation failed');
      return { ok: false, error: outcome.error };
    }
    this.progress.done(true, 'Generated commit message');

    const message = postProcess(normalizeGeneratedText(outcome.text), changeSet, this.policy, {
      coAuthors: this.config.commit.coAuthors,
      emojisEnabled: this.config.commit.emojis,
    });

    if (shouldValidate(this.policy)) {
      const validation = validateConventional(message, this.policy);
      if (!validation.ok) {
        return { ok: false, error: validation.error };
      }
    }

    return { ok: true, message, attempts: outcome.attempts };
  }

  private resolveBackend(): GenerationBackend {
    if (this.options.backend) {
      return this.options.backend;
    }
    return createBackend(
      { provider: this.config.ai.provider, localUrl: this.config.ai.local.url },
      this.options.env ?? process.env
    );
  }

  private reportFailure(failure: AttemptFailure): void {
    if (failure.willRetry) {
      this.progress.warn(
        `Attempt ${failure.attempt} failed: ${failure.error.message}. Retrying in ${failure.retryDelay} seconds...`
      );
    } else {
      this.progress.debug(`Attempt ${failure.attempt} failed: ${failure.error.message}`);
    }
  }
}

/**
 * Generate a commit message in one call
 */
export function generateCommitMessage(
  changeSet: ChangeSet,
  options: GeneratorOptions
): Promise<PipelineResult> {
  return new CommitMessageGenerator(options).generate(changeSet);
}
