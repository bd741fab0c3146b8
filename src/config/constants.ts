/**
 * Toolkit Constants and Defaults
 *
 * Timeouts, retry budgets, byte budgets and default images in one place.
 */

import { z } from 'zod';

/**
 * Log level schema shared by the environment loader and the logger factory.
 */
export const logLevelSchema = z
  .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
  .describe('Minimum log level');

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Grace period for stopping a container, in seconds (engine API unit). */
  containerStopGraceSeconds: 30,
  /** Readiness HTTP probe timeout: 3 seconds. */
  readinessProbe: 3_000,
  /** Post-startup health check timeout: 5 seconds. */
  healthCheck: 5_000,
  /** Catalog API request timeout: 5 seconds. */
  catalogRequest: 5_000,
  /** SQL Server connection timeout during readiness: 3 seconds. */
  sqlConnect: 3_000,
  /** Helm install/upgrade wait: 5 minutes. */
  helm: 300_000,
  /** Pod readiness wait: 2 minutes. */
  podReady: 120_000,
  /** StatefulSet rollout wait: 2 minutes. */
  statefulSetReady: 120_000,
  /** Port-forward readiness: 10 seconds. */
  portForward: 10_000,
  /** Port-forward dial interval: 100 milliseconds. */
  portForwardPoll: 100,
  /** Port-forward single dial timeout: 500 milliseconds. */
  portForwardDial: 500,
} as const;

/**
 * Polling budgets
 */
export const RETRY = {
  /** Stability window: 6 checks 500ms apart (3 seconds). */
  STABILITY: { attempts: 6, intervalMs: 500 },
  /** Message broker readiness: 60 attempts 2s apart, diagnostics every 10 failures. */
  ACTIVEMQ_READINESS: { attempts: 60, intervalMs: 2_000, diagnosticsEvery: 10 },
  /** Relational database readiness: 30 attempts 2s apart. */
  SQLSERVER_READINESS: { attempts: 30, intervalMs: 2_000 },
  /** Generic HTTP service readiness: 30 attempts 1s apart. */
  HTTP_READINESS: { attempts: 30, intervalMs: 1_000 },
  /** Kind node readiness: 30 attempts 2s apart. */
  KIND_NODES: { attempts: 30, intervalMs: 2_000 },
} as const;

/**
 * Size limits
 */
export const LIMITS = {
  /** Bytes of container logs emitted by failure diagnostics: 8KB */
  DIAGNOSTIC_LOG_BYTES: 8_192,
  /** Log lines requested from the engine before trimming to the byte budget */
  DIAGNOSTIC_LOG_TAIL_LINES: 500,
  /** Maximum captured output of an external command: 10MB */
  MAX_COMMAND_BUFFER: 10 * 1024 * 1024,
} as const;

/**
 * Default network configuration
 */
export const DEFAULT_NETWORK = {
  host: 'localhost',
  loopback: '127.0.0.1',
} as const;

/**
 * Container engine constants
 */
export const DOCKER = {
  /** Default Unix socket */
  DEFAULT_SOCKET: '/var/run/docker.sock',
  /** Default named pipe on Windows */
  WINDOWS_PIPE: '//./pipe/docker_engine',
  /** Default TCP port when DOCKER_HOST is tcp:// without a port */
  DEFAULT_TCP_PORT: 2375,
} as const;

/**
 * Images used by the workload containers
 */
export const IMAGES = {
  ACTIVEMQ: 'apache/activemq-classic:5.18.7',
  SQLSERVER: 'mcr.microsoft.com/azure-sql-edge:latest',
  KIND_NODE: 'kindest/node',
} as const;

/**
 * Kubernetes-related constants
 */
export const KUBERNETES = {
  /** Default kind cluster name */
  DEFAULT_KIND_CLUSTER: 'kind',
  /** kind context prefix */
  KIND_CONTEXT_PREFIX: 'kind-',
  /** Annotation holding the owning helm release */
  HELM_RELEASE_ANNOTATION: 'meta.helm.sh/release-name',
  /** Annotation holding the owning helm release namespace */
  HELM_NAMESPACE_ANNOTATION: 'meta.helm.sh/release-namespace',
} as const;
