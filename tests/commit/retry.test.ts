import { describe, it, expect, vi } from 'vitest';
import { runWithRetry, type AttemptFailure, type RetryOutcome } from '../../src/commit/retry.js';
import {
  BackendError,
  CancelledError,
  ConfigError,
  ExhaustedRetriesError,
  MissingCredentialError,
  TimeoutError,
  type ScribeError,
} from '../../src/commit/errors.js';

const fast = { maxAttempts: 3, retryDelay: 0, timeout: 5 };

function failureOf(outcome: RetryOutcome): ScribeError {
  if (outcome.ok) {
    throw new Error(`expected failure, got "${outcome.text}"`);
  }
  return outcome.error;
}

describe('runWithRetry', () => {
  it('should call the backend exactly maxAttempts times when it always fails', async () => {
    const lastFailure = new BackendError('service unavailable', 'openai', { status: 503 });
    const generate = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new BackendError('first', 'openai'))
      .mockRejectedValueOnce(new BackendError('second', 'openai'))
      .mockRejectedValueOnce(lastFailure);

    const outcome = await runWithRetry(fast, generate);

    expect(generate).toHaveBeenCalledTimes(3);
    expect(outcome.attempts).toBe(3);
    const error = failureOf(outcome);
    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    expect(error instanceof ExhaustedRetriesError && error.lastError).toBe(lastFailure);
    expect(error.message).toBe('failed after 3 attempts: service unavailable');
  });

  it('should return the second attempt when the first fails', async () => {
    const generate = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new BackendError('flaky', 'local'))
      .mockResolvedValueOnce('feat: add login')
      .mockResolvedValueOnce('never used');

    const outcome = await runWithRetry(fast, generate);

    expect(outcome).toEqual({ ok: true, text: 'feat: add login', attempts: 2 });
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it('should wrap unknown thrown values as backend errors', async () => {
    const outcome = await runWithRetry(
      { ...fast, maxAttempts: 1, label: 'local' },
      async () => {
        throw new Error('socket hang up');
      }
    );

    const error = failureOf(outcome);
    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    const last = error instanceof ExhaustedRetriesError ? error.lastError : undefined;
    expect(last).toBeInstanceOf(BackendError);
    expect(last instanceof BackendError && last.provider).toBe('local');
    expect(last?.message).toBe('socket hang up');
  });

  it('should stop at once on a non-retryable failure', async () => {
    const missing = new MissingCredentialError('OPENAI_API_KEY');
    const generate = vi.fn<(signal: AbortSignal) => Promise<string>>().mockRejectedValue(missing);

    const outcome = await runWithRetry(fast, generate);

    expect(generate).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({ ok: false, error: missing, attempts: 1 });
  });

  it('should time out an attempt and abort its signal', async () => {
    const signals: AbortSignal[] = [];
    const generate = (signal: AbortSignal): Promise<string> => {
      signals.push(signal);
      return new Promise<string>(() => {});
    };

    const outcome = await runWithRetry(
      { maxAttempts: 2, retryDelay: 0, timeout: 0.02 },
      generate
    );

    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
    const error = failureOf(outcome);
    expect(error instanceof ExhaustedRetriesError && error.lastError).toBeInstanceOf(TimeoutError);
  });

  it('should classify a rejection after the deadline as a timeout', async () => {
    const outcome = await runWithRetry(
      { maxAttempts: 1, retryDelay: 0, timeout: 0.02 },
      (signal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted by transport')));
        })
    );

    const error = failureOf(outcome);
    const last = error instanceof ExhaustedRetriesError ? error.lastError : undefined;
    expect(last).toBeInstanceOf(TimeoutError);
    expect(last?.message).toBe('request timed out after 0.02s');
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const generate = vi.fn<(signal: AbortSignal) => Promise<string>>();

    const outcome = await runWithRetry({ ...fast, signal: controller.signal }, generate);

    expect(generate).not.toHaveBeenCalled();
    expect(failureOf(outcome)).toBeInstanceOf(CancelledError);
    expect(outcome.attempts).toBe(0);
  });

  it('should cancel an attempt in flight', async () => {
    const controller = new AbortController();
    const generate = vi.fn((_signal: AbortSignal): Promise<string> => {
      controller.abort();
      return new Promise<string>(() => {});
    });

    const outcome = await runWithRetry({ ...fast, signal: controller.signal }, generate);

    expect(generate).toHaveBeenCalledTimes(1);
    expect(failureOf(outcome)).toBeInstanceOf(CancelledError);
    expect(outcome.attempts).toBe(1);
  });

  it('should cancel during the delay between attempts', async () => {
    const controller = new AbortController();
    const generate = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValue(new BackendError('down', 'local'));

    const outcome = await runWithRetry(
      {
        maxAttempts: 3,
        retryDelay: 60,
        timeout: 5,
        signal: controller.signal,
        onAttemptFailed: () => controller.abort(),
      },
      generate
    );

    expect(generate).toHaveBeenCalledTimes(1);
    expect(failureOf(outcome)).toBeInstanceOf(CancelledError);
  });

  it('should report every failed attempt', async () => {
    const failures: AttemptFailure[] = [];

    await runWithRetry(
      { ...fast, retryDelay: 0, onAttemptFailed: (failure) => failures.push(failure) },
      async () => {
        throw new BackendError('down', 'local');
      }
    );

    expect(failures.map((f) => [f.attempt, f.maxAttempts, f.willRetry])).toEqual([
      [1, 3, true],
      [2, 3, true],
      [3, 3, false],
    ]);
  });

  it('should reject invalid options without calling the backend', async () => {
    const generate = vi.fn<(signal: AbortSignal) => Promise<string>>();

    const outcome = await runWithRetry({ ...fast, maxAttempts: 0 }, generate);

    expect(generate).not.toHaveBeenCalled();
    expect(failureOf(outcome)).toBeInstanceOf(ConfigError);
    expect(outcome.attempts).toBe(0);
  });

  it('should log failed attempts when verbose', async () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await runWithRetry({ ...fast, maxAttempts: 1, verbose: true, label: 'openai' }, async () => {
      throw new BackendError('bad gateway', 'openai');
    });

    expect(consoleSpy).toHaveBeenCalledWith(
      '[Retry] openai attempt 1/1 failed (backend): bad gateway'
    );
    consoleSpy.mockRestore();
  });
});
