/**
 * Composition root
 *
 * Builds the logger, engine client and command runner once and hands them to every
 * component through explicit factories.
 */

import type { Logger } from 'pino';
import { loadConfig, type TestkitConfig } from '@/config';
import { createActiveMQContainer, type ActiveMQContainer, type ActiveMQOptions } from '@/containers/activemq';
import { createManagedContainer, type ManagedContainer } from '@/containers/container';
import {
  createHttpServiceContainer,
  type HttpServiceContainer,
  type HttpServiceOptions,
} from '@/containers/http-service';
import type { ContainerSpecInput } from '@/containers/schema';
import type { ServiceContainerOptions } from '@/containers/service-container';
import {
  createSqlServerContainer,
  type SqlServerContainer,
  type SqlServerOptions,
} from '@/containers/sqlserver';
import { createDockerClient, type DockerClient } from '@/infra/docker/client';
import { CatalogClient, type CatalogClientConfig } from '@/infra/http/catalog-client';
import { HelmChart } from '@/infra/kubernetes/helm';
import { KindCluster, type KindClusterOptions } from '@/infra/kubernetes/kind';
import { Kubectl, type KubectlOptions } from '@/infra/kubernetes/kubectl';
import { Namespace } from '@/infra/kubernetes/namespace';
import { createCommandRunner, type CommandRunner } from '@/infra/process/runner';
import { createLogger } from '@/lib/logger';
import type { RetryPolicy, SleepFn } from '@/lib/poll';
import { Success, type Result } from '@/types';

export interface TestkitOptions {
  /** Environment read by `loadConfig`, default `process.env` */
  env?: NodeJS.ProcessEnv;
  /** Overrides applied on top of the environment */
  config?: Partial<TestkitConfig>;
  logger?: Logger;
  docker?: DockerClient;
  runner?: CommandRunner;
  /** Sleep used by every polling loop */
  sleep?: SleepFn;
}

/** Per-call overrides for the workload factories */
export interface WorkloadOverrides {
  readiness?: RetryPolicy;
  stability?: RetryPolicy;
}

/** A plain container has no readiness probe, only the stability window */
export type ContainerOverrides = Pick<WorkloadOverrides, 'stability'>;

export interface Testkit {
  readonly config: TestkitConfig;
  readonly logger: Logger;
  readonly docker: DockerClient;
  readonly runner: CommandRunner;

  container(spec: ContainerSpecInput, overrides?: ContainerOverrides): Result<ManagedContainer>;
  activeMQ(options: ActiveMQOptions, overrides?: WorkloadOverrides): Result<ActiveMQContainer>;
  sqlServer(options: SqlServerOptions, overrides?: WorkloadOverrides): Result<SqlServerContainer>;
  httpService(options: HttpServiceOptions, overrides?: WorkloadOverrides): Result<HttpServiceContainer>;

  kind(options?: KindClusterOptions): KindCluster;
  kubectl(options?: KubectlOptions): Kubectl;
  /** Helm chart builder; kubectl defaults to the current context */
  helm(chart: string, kubectl?: Kubectl): HelmChart;
  namespace(name: string, kubectl?: Kubectl): Namespace;
  catalog(config: CatalogClientConfig): CatalogClient;
}

/**
 * Create the toolkit from the environment and explicit overrides.
 *
 * @example
 * ```typescript
 * const kit = mustSucceed(createTestkit());
 * const broker = mustSucceed(kit.activeMQ({ name: 'orders-broker' }));
 * mustSucceed(await broker.start());
 * ```
 */
export function createTestkit(options: TestkitOptions = {}): Result<Testkit> {
  const loaded = loadConfig(options.env ?? process.env);
  if (!loaded.ok) {
    return loaded;
  }
  const config: TestkitConfig = { ...loaded.value, ...options.config };

  const logger = options.logger ?? createLogger({ name: 'container-testkit', level: config.logLevel });
  const docker =
    options.docker ??
    createDockerClient(logger, {
      ...(config.dockerSocket !== undefined ? { socketPath: config.dockerSocket } : {}),
      ...(config.dockerTimeoutMs !== undefined ? { timeout: config.dockerTimeoutMs } : {}),
    });
  const runner = options.runner ?? createCommandRunner(logger);
  const sleep = options.sleep;

  const deps = (overrides: WorkloadOverrides = {}): ServiceContainerOptions => ({
    docker,
    logger,
    ...(sleep && { sleep }),
    ...(overrides.readiness && { readiness: overrides.readiness }),
    ...(overrides.stability && { stability: overrides.stability }),
  });

  // The environment reuse default only applies to named containers.
  const withReuse = <T extends { name?: string; reuse?: boolean }>(input: T): T =>
    input.reuse === undefined && input.name ? { ...input, reuse: config.reuse } : input;

  const defaultKubectl = (): Kubectl => new Kubectl(runner, logger);

  logger.debug({ reuse: config.reuse, kindNodeVersion: config.kindNodeVersion }, 'Testkit created');

  return Success({
    config,
    logger,
    docker,
    runner,

    container: (spec, overrides) => createManagedContainer(withReuse(spec), deps(overrides)),
    activeMQ: (activeMQOptions, overrides) => createActiveMQContainer(withReuse(activeMQOptions), deps(overrides)),
    sqlServer: (sqlOptions, overrides) => createSqlServerContainer(withReuse(sqlOptions), deps(overrides)),
    httpService: (httpOptions, overrides) =>
      createHttpServiceContainer({ ...httpOptions, spec: withReuse(httpOptions.spec) }, deps(overrides)),

    kind: (kindOptions = {}) =>
      new KindCluster(runner, logger, {
        version: config.kindNodeVersion,
        ...(sleep && { sleep }),
        ...kindOptions,
      }),
    kubectl: (kubectlOptions = {}) => new Kubectl(runner, logger, kubectlOptions),
    helm: (chart, kubectl) => new HelmChart(chart, { runner, logger, kubectl: kubectl ?? defaultKubectl() }),
    namespace: (name, kubectl) => new Namespace(kubectl ?? defaultKubectl(), logger, name),
    catalog: (catalogConfig) => new CatalogClient(catalogConfig, logger),
  });
}
