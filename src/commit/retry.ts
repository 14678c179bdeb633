/**
 * Retry/timeout orchestrator
 *
 * Drives a generation call under a per-attempt deadline and a bounded number
 * of strictly sequential attempts. Outcomes are returned as values; nothing
 * is thrown for control flow.
 */

import {
  CancelledError,
  ConfigError,
  ExhaustedRetriesError,
  ScribeError,
  TimeoutError,
  toScribeError,
} from './errors.js';
import { sleep } from '../utils/index.js';

/**
 * A single generation attempt. The signal aborts when the attempt's
 * deadline fires or the caller cancels.
 */
export type GenerateFn = (signal: AbortSignal) => Promise<string>;

/**
 * Information about a failed attempt
 */
export interface AttemptFailure {
  attempt: number;
  maxAttempts: number;
  error: ScribeError;
  /** Whether another attempt follows */
  willRetry: boolean;
  /** Seconds until the next attempt */
  retryDelay: number;
}

/**
 * Orchestrator options
 */
export interface RetryOptions {
  /** Total attempts (>= 1) */
  maxAttempts: number;
  /** Seconds to wait between attempts (>= 0) */
  retryDelay: number;
  /** Per-attempt deadline in seconds (> 0) */
  timeout: number;
  /** External cancellation */
  signal?: AbortSignal;
  /** Called after every failed attempt, before any delay */
  onAttemptFailed?: (failure: AttemptFailure) => void;
  /** Enable verbose logging */
  verbose?: boolean;
  /** Label for verbose log lines (usually the backend name) */
  label?: string;
}

/**
 * Outcome of the orchestrator
 */
export type RetryOutcome =
  | { ok: true; text: string; attempts: number }
  | { ok: false; error: ScribeError; attempts: number };

type AttemptResult = { ok: true; text: string } | { ok: false; error: ScribeError };

/**
 * Run `generateFn` until it succeeds, a non-retryable failure occurs,
 * the caller cancels, or `maxAttempts` attempts have failed
 */
export async function runWithRetry(
  options: RetryOptions,
  generateFn: GenerateFn
): Promise<RetryOutcome> {
  const { maxAttempts, retryDelay, timeout, signal, onAttemptFailed } = options;

  const invalid = checkOptions(options);
  if (invalid) {
    return { ok: false, error: invalid, attempts: 0 };
  }

  let lastError: ScribeError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { ok: false, error: new CancelledError(), attempts: attempt - 1 };
    }

    const result = await runAttempt(generateFn, timeout, signal, options.label);
    if (result.ok) {
      return { ok: true, text: result.text, attempts: attempt };
    }

    lastError = result.error;
    const willRetry = lastError.retryable && attempt < maxAttempts;

    if (options.verbose) {
      console.error(
        `[Retry] ${options.label ?? 'generate'} attempt ${attempt}/${maxAttempts} failed (${lastError.kind}): ${lastError.message}`
      );
    }
    onAttemptFailed?.({ attempt, maxAttempts, error: lastError, willRetry, retryDelay });

    if (!lastError.retryable) {
      return { ok: false, error: lastError, attempts: attempt };
    }
    if (!willRetry) {
      break;
    }

    await sleep(retryDelay * 1000, signal);
    if (signal?.aborted) {
      return { ok: false, error: new CancelledError(), attempts: attempt };
    }
  }

  if (!lastError) {
    return { ok: false, error: new ConfigError('no attempt was made'), attempts: 0 };
  }
  return {
    ok: false,
    error: new ExhaustedRetriesError(maxAttempts, lastError),
    attempts: maxAttempts,
  };
}

/**
 * Run one attempt under a fresh deadline
 *
 * The call is raced against the deadline so a transport that ignores the
 * abort signal still cannot outlive it.
 */
async function runAttempt(
  generateFn: GenerateFn,
  timeoutSeconds: number,
  parent: AbortSignal | undefined,
  label: string | undefined
): Promise<AttemptResult> {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort(new CancelledError());
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new TimeoutError(timeoutSeconds));
  }, timeoutSeconds * 1000);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });

  try {
    const text = await Promise.race([generateFn(controller.signal), aborted]);
    return { ok: true, text };
  } catch (error) {
    if (parent?.aborted) {
      return { ok: false, error: new CancelledError() };
    }
    if (timedOut) {
      return { ok: false, error: new TimeoutError(timeoutSeconds) };
    }
    return { ok: false, error: toScribeError(error, label) };
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

function checkOptions(options: RetryOptions): ConfigError | undefined {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    return new ConfigError(`maxRetries must be at least 1, got ${options.maxAttempts}`);
  }
  if (!(options.retryDelay >= 0)) {
    return new ConfigError(`retryDelay must not be negative, got ${options.retryDelay}`);
  }
  if (!(options.timeout > 0)) {
    return new ConfigError(`timeout must be positive, got ${options.timeout}`);
  }
  return undefined;
}
