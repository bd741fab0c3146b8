/**
 * Bounded polling
 *
 * One retry loop shared by every readiness check in the toolkit: workload probes,
 * kind node readiness, and anything else that waits for an external system.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { cancelledFailure, extractErrorMessage, isAbortError } from './errors';

/**
 * Sleep that rejects as soon as the signal aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

/**
 * Attempt budget for a polling loop.
 */
export interface RetryPolicy {
  /** Maximum number of predicate invocations */
  attempts: number;
  /** Delay between failed attempts */
  intervalMs: number;
  /** Run `onDiagnostics` after every N-th failed attempt */
  diagnosticsEvery?: number;
}

export interface PollOptions extends RetryPolicy {
  /** Subject used in log records and the exhaustion error, e.g. "ActiveMQ" */
  description: string;
  signal?: AbortSignal;
  sleep?: SleepFn;
  logger?: Logger;
  /** Periodic side effect, typically a diagnostics dump */
  onDiagnostics?: (failedAttempts: number) => Promise<void> | void;
}

export interface PollOutcome {
  /** Attempt on which the predicate first succeeded (1-based) */
  attempts: number;
}

/**
 * Invoke `predicate` until it returns true or the budget runs out.
 *
 * Cancellation is checked before every attempt and interrupts the sleep between
 * attempts. A predicate that throws counts as a failed attempt. There is no sleep after
 * the final attempt.
 */
export async function pollUntil(
  predicate: (attempt: number) => Promise<boolean>,
  options: PollOptions,
): Promise<Result<PollOutcome>> {
  const { attempts, intervalMs, description, signal, logger } = options;
  const wait = options.sleep ?? sleep;

  logger?.debug({ attempts, intervalMs }, `Waiting for ${description} to become ready`);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (signal?.aborted) {
      logger?.info({ attempt }, `Readiness check for ${description} cancelled`);
      return cancelledFailure(`waiting for ${description}`, signal);
    }

    let ready = false;
    try {
      ready = await predicate(attempt);
    } catch (error) {
      logger?.debug({ attempt, error: extractErrorMessage(error) }, 'Readiness predicate threw');
    }

    if (ready) {
      logger?.debug({ attempt }, `${description} ready`);
      return Success({ attempts: attempt });
    }

    logger?.debug({ attempt, attempts }, `Readiness check for ${description} failed`);

    const every = options.diagnosticsEvery;
    if (options.onDiagnostics && every !== undefined && every > 0 && attempt % every === 0) {
      try {
        await options.onDiagnostics(attempt);
      } catch (error) {
        logger?.warn({ error: extractErrorMessage(error) }, 'Periodic diagnostics failed');
      }
    }

    if (attempt < attempts) {
      try {
        await wait(intervalMs, signal);
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          return cancelledFailure(`waiting for ${description}`, signal);
        }
        throw error;
      }
    }
  }

  return Failure(`${description} failed to become ready after ${attempts} attempts`, {
    message: `${description} did not pass its readiness check`,
    hint: 'The service may still be starting, or it exited during startup',
    resolution: 'Check the container logs emitted above and raise the retry budget if needed',
    details: { attempts, intervalMs },
  });
}
