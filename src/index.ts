/**
 * Container lifecycle helpers for integration tests.
 *
 * @example
 * ```typescript
 * import { createTestkit, mustSucceed } from 'container-testkit';
 *
 * const kit = mustSucceed(createTestkit());
 * const db = mustSucceed(kit.sqlServer({ name: 'orders-db', password: 'test-secret' }));
 * mustSucceed(await db.start());
 * try {
 *   // run queries against db.getConnectionString()
 * } finally {
 *   await db.cleanup();
 * }
 * ```
 */

export { createTestkit } from './app/index';
export type { Testkit, TestkitOptions, WorkloadOverrides, ContainerOverrides } from './app/index';

export { Success, Failure, mustSucceed, TestkitError } from './types';
export type { Result, Ok, Err, ErrorGuidance } from './types';
export { ERROR_MESSAGES, extractErrorMessage, isCancelled } from './lib/errors';

export { loadConfig } from './config';
export type { TestkitConfig } from './config';
export { DEFAULT_TIMEOUTS, RETRY, IMAGES } from './config/constants';

export { createLogger, createSilentLogger } from './lib/logger';
export type { Logger, LoggerOptions } from './lib/logger';

export { pollUntil, sleep } from './lib/poll';
export type { PollOptions, RetryPolicy, SleepFn } from './lib/poll';
export { getFreePort, isPortAvailable, canConnect } from './lib/port-utils';

export { ManagedContainer, createManagedContainer } from './containers/container';
export type { ManagedContainerOptions } from './containers/container';
export { parseContainerSpec } from './containers/schema';
export type { ContainerSpecInput } from './containers/schema';
export type {
  ContainerSpec,
  ContainerPhase,
  ContainerInspection,
  ContainerState,
  ExecResult,
  Mount,
} from './containers/types';
export { printLogsOnFailure } from './containers/diagnostics';
export { ServiceContainer } from './containers/service-container';
export type { ServiceContainerOptions } from './containers/service-container';
export { ActiveMQContainer, createActiveMQContainer, ACTIVEMQ_PORTS } from './containers/activemq';
export type { ActiveMQOptions, Credentials } from './containers/activemq';
export { SqlServerContainer, createSqlServerContainer, SQLSERVER_PORT } from './containers/sqlserver';
export type { SqlServerOptions } from './containers/sqlserver';
export { HttpServiceContainer, createHttpServiceContainer } from './containers/http-service';
export type { HttpServiceOptions } from './containers/http-service';

export { createDockerClient, buildCreateContainerOptions } from './infra/docker/client';
export type { DockerClient, DockerClientConfig } from './infra/docker/client';

export { createCommandRunner, runChecked, formatCommand } from './infra/process/runner';
export type { CommandRunner, CommandResult, BackgroundProcess, RunOptions } from './infra/process/runner';

export { KindCluster } from './infra/kubernetes/kind';
export type { KindClusterOptions } from './infra/kubernetes/kind';
export { Kubectl } from './infra/kubernetes/kubectl';
export type { KubectlOptions } from './infra/kubernetes/kubectl';
export { HelmChart } from './infra/kubernetes/helm';
export type { HelmValues, HelmChartConfig } from './infra/kubernetes/helm';
export { Namespace } from './infra/kubernetes/namespace';
export { Pod } from './infra/kubernetes/pod';
export type { PortForward } from './infra/kubernetes/pod';
export { StatefulSet, Secret, ConfigMap, PersistentVolumeClaim } from './infra/kubernetes/resources';
export { toObjectReference } from './infra/kubernetes/object';
export type { KubeObject, ObjectReference, OwnerReference } from './infra/kubernetes/object';

export { CatalogClient } from './infra/http/catalog-client';
export type {
  CatalogClientConfig,
  ResourceSelector,
  CatalogChangesRequest,
  CatalogChangesResponse,
  ConfigChange,
  SelectedResource,
  ScrapeResult,
} from './infra/http/catalog-client';
