/**
 * Error taxonomy for the commit message pipeline
 *
 * Every failure the pipeline can report is one of these classes. Callers
 * switch on `kind` to pick a diagnostic and an exit code.
 */

/**
 * Discriminant for pipeline failures
 */
export type ScribeErrorKind =
  | 'missing-credential'
  | 'backend'
  | 'timeout'
  | 'cancelled'
  | 'exhausted-retries'
  | 'format'
  | 'empty-change-set'
  | 'config';

/**
 * Base class for all pipeline errors
 */
export abstract class ScribeError extends Error {
  abstract readonly kind: ScribeErrorKind;
  /** Whether the retry orchestrator may spend another attempt after this failure */
  abstract readonly retryable: boolean;
}

/**
 * Required credential is absent from the environment
 */
export class MissingCredentialError extends ScribeError {
  readonly kind = 'missing-credential';
  readonly retryable = false;

  constructor(public readonly variable: string) {
    super(`${variable} environment variable not set`);
    this.name = 'MissingCredentialError';
  }
}

/**
 * Transport, status or response-shape failure from a generation backend
 */
export class BackendError extends ScribeError {
  readonly kind = 'backend';
  readonly retryable = true;
  /** HTTP status, when the backend answered */
  readonly status?: number;

  constructor(
    message: string,
    public readonly provider: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'BackendError';
    this.status = options?.status;
  }
}

/**
 * A single attempt exceeded its deadline
 */
export class TimeoutError extends ScribeError {
  readonly kind = 'timeout';
  readonly retryable = true;

  constructor(public readonly timeoutSeconds: number) {
    super(`request timed out after ${timeoutSeconds}s`);
    this.name = 'TimeoutError';
  }
}

/**
 * The operation was aborted from outside
 */
export class CancelledError extends ScribeError {
  readonly kind = 'cancelled';
  readonly retryable = false;

  constructor(message = 'operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Every attempt failed
 */
export class ExhaustedRetriesError extends ScribeError {
  readonly kind = 'exhausted-retries';
  readonly retryable = false;

  constructor(
    public readonly attempts: number,
    public readonly lastError: ScribeError
  ) {
    super(`failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'ExhaustedRetriesError';
  }
}

/**
 * Final message does not match the conventional commit grammar
 */
export class FormatError extends ScribeError {
  readonly kind = 'format';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly commitMessage: string
  ) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * Nothing is staged
 */
export class EmptyChangeSetError extends ScribeError {
  readonly kind = 'empty-change-set';
  readonly retryable = false;

  constructor() {
    super('no staged changes found');
    this.name = 'EmptyChangeSetError';
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigError extends ScribeError {
  readonly kind = 'config';
  readonly retryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ConfigError';
  }
}

/**
 * Process exit code for each failure kind
 */
export const EXIT_CODES: Record<ScribeErrorKind, number> = {
  'empty-change-set': 2,
  'missing-credential': 3,
  'exhausted-retries': 4,
  format: 5,
  cancelled: 130,
  backend: 1,
  timeout: 1,
  config: 1,
};

/**
 * Normalize an unknown thrown value into a ScribeError
 */
export function toScribeError(error: unknown, provider = 'unknown'): ScribeError {
  if (error instanceof ScribeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(message, provider, { cause: error });
}
