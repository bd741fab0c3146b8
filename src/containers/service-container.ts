/**
 * Readiness layer over the lifecycle controller
 *
 * A workload supplies its endpoints, a connection predicate and a retry budget; the
 * polling, periodic diagnostics and failure diagnostics live here once.
 */

import type { Logger } from 'pino';
import { isCancelled } from '@/lib/errors';
import { pollUntil, sleep as defaultSleep, type RetryPolicy, type SleepFn } from '@/lib/poll';
import { Success, Failure, type Result } from '@/types';
import { ManagedContainer, type ManagedContainerOptions } from './container';
import type { ContainerPhase, ExecResult, LogOptions } from './types';

export interface ServiceContainerOptions extends ManagedContainerOptions {
  /** Overrides the workload's readiness budget */
  readiness?: RetryPolicy;
}

export abstract class ServiceContainer {
  protected readonly container: ManagedContainer;
  protected readonly logger: Logger;
  private readonly readiness: RetryPolicy;
  private readonly sleep: SleepFn;

  /** Name used in log records and readiness errors */
  protected abstract readonly description: string;

  protected constructor(container: ManagedContainer, readiness: RetryPolicy, sleep?: SleepFn) {
    this.container = container;
    this.logger = container.getLogger();
    this.readiness = readiness;
    this.sleep = sleep ?? defaultSleep;
  }

  /** Resolve published ports into endpoint strings once the container runs */
  protected abstract resolveEndpoints(): Promise<Result<void>>;

  /** One readiness attempt */
  protected abstract testConnection(): Promise<boolean>;

  abstract healthCheck(): Promise<Result<void>>;

  /** Extra verification after the readiness probe passes */
  protected async afterReady(): Promise<Result<void>> {
    return Success(undefined);
  }

  /**
   * Start the container, then wait until the workload answers its readiness probe.
   */
  async start(signal?: AbortSignal): Promise<Result<void>> {
    this.logger.info({ image: this.container.getSpec().image }, `Starting ${this.description}`);

    const started = await this.container.start(signal);
    if (!started.ok) {
      return Failure(`failed to start ${this.description} container: ${started.error}`, started.guidance);
    }

    const endpoints = await this.resolveEndpoints();
    if (!endpoints.ok) {
      return endpoints;
    }

    const ready = await pollUntil(() => this.testConnection(), {
      ...this.readiness,
      description: this.description,
      sleep: this.sleep,
      logger: this.logger,
      ...(signal && { signal }),
      onDiagnostics: (failedAttempts) =>
        this.container.printLogsOnFailure(
          `${this.description} readiness check failing after ${failedAttempts} attempts`,
        ),
    });

    if (!ready.ok) {
      if (!isCancelled(ready)) {
        await this.container.printLogsOnFailure(ready.error);
      }
      return ready;
    }

    const verified = await this.afterReady();
    if (!verified.ok) {
      await this.container.printLogsOnFailure(`${this.description} health check failed: ${verified.error}`);
      return Failure(`${this.description} health check failed: ${verified.error}`, verified.guidance);
    }

    this.logger.info({ attempts: ready.value.attempts }, `${this.description} is ready`);
    return Success(undefined);
  }

  stop(): Promise<Result<void>> {
    return this.container.stop();
  }

  cleanup(): Promise<Result<void>> {
    return this.container.cleanup();
  }

  isRunning(): Promise<Result<boolean>> {
    return this.container.isRunning();
  }

  getPort(containerPort: number | string): Promise<Result<number>> {
    return this.container.getPort(containerPort);
  }

  getId(): string {
    return this.container.getId();
  }

  get phase(): ContainerPhase {
    return this.container.phase;
  }

  logs(options?: LogOptions): Promise<Result<string>> {
    return this.container.logs(options);
  }

  exec(command: readonly string[]): Promise<Result<ExecResult>> {
    return this.container.exec(command);
  }

  printLogsOnFailure(reason: string): Promise<void> {
    return this.container.printLogsOnFailure(reason);
  }

  /** Underlying lifecycle controller */
  getContainer(): ManagedContainer {
    return this.container;
  }
}
