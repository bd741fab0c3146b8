/**
 * Docker error guidance
 *
 * Translates dockerode/daemon errors into messages with a hint and a resolution.
 */

import type { ErrorGuidance } from '@/types';

/**
 * Shape of errors raised by dockerode (docker-modem adds the HTTP fields).
 */
interface DockerodeError extends Error {
  statusCode?: number;
  json?: Record<string, unknown>;
  reason?: string;
  code?: string;
}

function hasDockerodeProperties(error: Error): error is DockerodeError {
  return (
    'statusCode' in error || 'json' in error || 'reason' in error || 'code' in error
  );
}

function daemonMessage(error: DockerodeError): string {
  const fromJson = error.json?.message;
  if (typeof fromJson === 'string' && fromJson.length > 0) {
    return fromJson;
  }
  return error.reason ?? error.message;
}

export interface DockerErrorGuidance extends ErrorGuidance {
  message: string;
}

/**
 * Extract message, hint and resolution from an engine error.
 */
export function extractDockerErrorGuidance(error: unknown): DockerErrorGuidance {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  if (!hasDockerodeProperties(error)) {
    return { message: error.message };
  }

  const details: Record<string, unknown> = {};
  if (error.statusCode !== undefined) details.statusCode = error.statusCode;
  if (error.code !== undefined) details.code = error.code;

  switch (error.code) {
    case 'ECONNREFUSED':
    case 'ENOENT':
      return {
        message: 'Cannot connect to the Docker daemon',
        hint: 'The Docker daemon is not running or the socket path is wrong',
        resolution: 'Start Docker, or point DOCKER_HOST / TESTKIT_DOCKER_SOCKET at the right socket',
        details,
      };
    case 'EACCES':
      return {
        message: 'Permission denied while connecting to the Docker daemon socket',
        hint: 'The current user cannot access the Docker socket',
        resolution: 'Add the user to the docker group or use a rootless Docker socket',
        details,
      };
  }

  const message = daemonMessage(error);

  switch (error.statusCode) {
    case 404:
      return {
        message,
        hint: 'The container or image does not exist',
        resolution: 'Check the name or id, and pull the image if it is missing',
        details,
      };
    case 409:
      return {
        message,
        hint: 'The request conflicts with the current state (name in use, container running)',
        resolution: 'Remove the conflicting container or enable reuse',
        details,
      };
    case 500:
      return {
        message,
        hint: 'The Docker daemon reported an internal error',
        resolution: 'Inspect the daemon logs; port conflicts and bad mounts are common causes',
        details,
      };
    default:
      return { message, details };
  }
}

/**
 * True when the engine answered with the given HTTP status (e.g. 304 Not Modified for
 * stopping a stopped container, 404 for a missing image).
 */
export function isDockerStatus(error: unknown, statusCode: number): boolean {
  return error instanceof Error && hasDockerodeProperties(error) && error.statusCode === statusCode;
}
