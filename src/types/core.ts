/**
 * Result type used by every fallible operation in the toolkit.
 *
 * Operations never throw for expected failures (engine errors, non-zero exit codes,
 * exhausted retries, cancellation). They return a `Failure` carrying a message and
 * optional guidance instead. `mustSucceed` is the opt-in escape hatch for callers that
 * prefer exceptions.
 */

/**
 * Structured guidance attached to a failure.
 */
export interface ErrorGuidance {
  /** Short description of what went wrong */
  message?: string;
  /** Likely cause */
  hint?: string;
  /** What the caller can do about it */
  resolution?: string;
  /** Machine-readable context (command, exit code, container id, ...) */
  details?: Record<string, unknown>;
}

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err {
  ok: false;
  error: string;
  guidance?: ErrorGuidance;
}

export type Result<T> = Ok<T> | Err;

export function Success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function Failure(error: string, guidance?: ErrorGuidance): Result<never> {
  if (guidance === undefined) {
    return { ok: false, error };
  }
  return { ok: false, error, guidance };
}

/**
 * Error thrown by `mustSucceed`. Keeps the failure guidance for test reporters.
 */
export class TestkitError extends Error {
  readonly guidance: ErrorGuidance | undefined;

  constructor(message: string, guidance?: ErrorGuidance) {
    super(message);
    this.name = 'TestkitError';
    this.guidance = guidance;
  }
}

/**
 * Unwrap a result, throwing `TestkitError` on failure.
 *
 * @example
 * ```typescript
 * const port = mustSucceed(await broker.getPort(8161));
 * ```
 */
export function mustSucceed<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new TestkitError(result.error, result.guidance);
  }
  return result.value;
}
