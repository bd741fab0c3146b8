/**
 * Diagnostics on failure
 *
 * Runs only on paths that already failed, so it logs and swallows every error of its
 * own and never changes what the caller returns.
 */

import type { Logger } from 'pino';
import { LIMITS } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import type { DockerClient } from '@/infra/docker/client';
import { tailBytes } from '@/infra/docker/logs';

export interface DiagnosticsOptions {
  /** Byte budget for the emitted log tail */
  maxBytes?: number;
  /** Lines requested from the engine before the byte budget applies */
  tailLines?: number;
}

/**
 * Log the container's engine state and the end of its logs.
 */
export async function printLogsOnFailure(
  docker: DockerClient,
  logger: Logger,
  containerId: string,
  reason: string,
  options: DiagnosticsOptions = {},
): Promise<void> {
  const maxBytes = options.maxBytes ?? LIMITS.DIAGNOSTIC_LOG_BYTES;
  const tailLines = options.tailLines ?? LIMITS.DIAGNOSTIC_LOG_TAIL_LINES;

  if (!containerId) {
    logger.error({ reason }, 'Container failed before it was created; no diagnostics available');
    return;
  }

  try {
    const inspected = await docker.inspectContainer(containerId);
    if (inspected.ok) {
      const { state } = inspected.value;
      logger.error(
        {
          containerId,
          reason,
          status: state.status,
          exitCode: state.exitCode,
          stateError: state.error || undefined,
          startedAt: state.startedAt,
          finishedAt: state.finishedAt,
        },
        'Container state at failure',
      );
    } else {
      logger.warn({ containerId, reason, error: inspected.error }, 'Could not inspect container');
    }

    const logs = await docker.getContainerLogs(containerId, { tail: tailLines });
    if (logs.ok) {
      const tail = tailBytes(logs.value, maxBytes);
      logger.error(
        { containerId, bytes: Buffer.byteLength(tail), truncated: tail.length < logs.value.length },
        `Container logs (last ${maxBytes} bytes):\n${tail}`,
      );
    } else {
      logger.warn({ containerId, error: logs.error }, 'Could not fetch container logs');
    }
  } catch (error) {
    logger.warn({ containerId, error: extractErrorMessage(error) }, 'Diagnostics collection failed');
  }
}
