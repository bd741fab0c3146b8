/**
 * Environment configuration
 *
 * Reads the handful of variables the toolkit honours and validates them with zod.
 */

import { z } from 'zod';
import { Success, Failure, type Result } from '@/types';
import { logLevelSchema, type LogLevel } from './constants';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const environmentSchema = z.object({
  TESTKIT_LOG_LEVEL: logLevelSchema.default('info'),
  TESTKIT_REUSE: booleanString.default('false'),
  TESTKIT_DOCKER_SOCKET: z.string().min(1).optional(),
  DOCKER_HOST: z.string().min(1).optional(),
  TESTKIT_DOCKER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TESTKIT_KIND_NODE_VERSION: z.string().min(1).default('latest'),
});

export interface TestkitConfig {
  logLevel: LogLevel;
  /** Default reuse policy for the workload factories */
  reuse: boolean;
  /** Explicit engine socket path, or a tcp:// URL from DOCKER_HOST */
  dockerSocket?: string;
  dockerTimeoutMs?: number;
  kindNodeVersion: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<TestkitConfig> {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Failure(`Invalid environment configuration: ${issues.join('; ')}`, {
      message: 'Environment variables failed validation',
      resolution: 'Fix or unset the listed variables',
      details: { issues },
    });
  }

  const values = parsed.data;
  const config: TestkitConfig = {
    logLevel: values.TESTKIT_LOG_LEVEL,
    reuse: values.TESTKIT_REUSE,
    kindNodeVersion: values.TESTKIT_KIND_NODE_VERSION,
  };

  const socket = values.TESTKIT_DOCKER_SOCKET ?? values.DOCKER_HOST;
  if (socket !== undefined) config.dockerSocket = socket;
  if (values.TESTKIT_DOCKER_TIMEOUT_MS !== undefined) {
    config.dockerTimeoutMs = values.TESTKIT_DOCKER_TIMEOUT_MS;
  }

  return Success(config);
}
