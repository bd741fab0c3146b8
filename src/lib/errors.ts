/**
 * Shared error helpers: message extraction and cancellation failures.
 */

import { Failure, type Result } from '@/types';

export const ERROR_MESSAGES = {
  CANCELLED: 'Operation cancelled',
  CONTAINER_NOT_STARTED: 'container not started',
  RELEASE_NAME_REQUIRED: 'release name is required',
} as const;

/**
 * Normalise a thrown value into a message string.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
}

/**
 * True for the rejection produced by an aborted `AbortSignal`.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Failure returned when a polling loop or command is interrupted by its signal.
 */
export function cancelledFailure(operation: string, signal?: AbortSignal): Result<never> {
  const reason: unknown = signal?.reason;
  return Failure(`${ERROR_MESSAGES.CANCELLED}: ${operation}`, {
    message: `${operation} was cancelled before it completed`,
    hint: 'The abort signal passed to the operation fired',
    details: {
      cancelled: true,
      ...(reason !== undefined && { reason: extractErrorMessage(reason) }),
    },
  });
}

/**
 * Detect failures produced by `cancelledFailure`.
 */
export function isCancelled(result: Result<unknown>): boolean {
  return !result.ok && result.guidance?.details?.cancelled === true;
}
