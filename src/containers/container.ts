/**
 * Container lifecycle controller
 *
 * A `ManagedContainer` owns one container handle: the engine id, the running flag and
 * the lifecycle phase. `start` walks `unstarted → locating → starting → stabilizing →
 * ready`; any step may end in `failed`. A handle is not safe to drive from concurrent
 * callers; use one per logical container.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS, RETRY } from '@/config/constants';
import { ERROR_MESSAGES, cancelledFailure, isAbortError } from '@/lib/errors';
import { sleep as defaultSleep, type RetryPolicy, type SleepFn } from '@/lib/poll';
import type { DockerClient } from '@/infra/docker/client';
import { Success, Failure, type Result } from '@/types';
import { printLogsOnFailure, type DiagnosticsOptions } from './diagnostics';
import { parseContainerSpec, type ContainerSpecInput } from './schema';
import {
  portKey,
  type ContainerPhase,
  type ContainerSpec,
  type ExecResult,
  type LogOptions,
} from './types';

export interface ManagedContainerOptions {
  docker: DockerClient;
  logger: Logger;
  /** Stability window; defaults to 6 checks 500 ms apart */
  stability?: RetryPolicy;
  stopGraceSeconds?: number;
  diagnostics?: DiagnosticsOptions;
  sleep?: SleepFn;
}

export class ManagedContainer {
  private readonly spec: ContainerSpec;
  private readonly docker: DockerClient;
  private readonly logger: Logger;
  private readonly stability: RetryPolicy;
  private readonly stopGraceSeconds: number;
  private readonly diagnostics: DiagnosticsOptions;
  private readonly sleep: SleepFn;
  private readonly publishedPorts: ReadonlySet<string>;

  private containerId = '';
  private running = false;
  private currentPhase: ContainerPhase = 'unstarted';

  constructor(spec: ContainerSpec, options: ManagedContainerOptions) {
    this.spec = spec;
    this.docker = options.docker;
    this.logger = options.logger.child({ container: spec.name ?? spec.image });
    this.stability = options.stability ?? RETRY.STABILITY;
    this.stopGraceSeconds = options.stopGraceSeconds ?? DEFAULT_TIMEOUTS.containerStopGraceSeconds;
    this.diagnostics = options.diagnostics ?? {};
    this.sleep = options.sleep ?? defaultSleep;
    this.publishedPorts = new Set(Object.keys(spec.ports).map(portKey));
  }

  get phase(): ContainerPhase {
    return this.currentPhase;
  }

  /** Engine id, empty until the container is created or located */
  getId(): string {
    return this.containerId;
  }

  /** Container name, or the short id for unnamed containers */
  get name(): string {
    return this.spec.name ?? this.containerId.slice(0, 12);
  }

  getSpec(): ContainerSpec {
    return {
      ...this.spec,
      ports: { ...this.spec.ports },
      env: [...this.spec.env],
      mounts: this.spec.mounts.map((mount) => ({ ...mount })),
    };
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Create or reuse the container, start it and confirm it stays up.
   */
  async start(signal?: AbortSignal): Promise<Result<void>> {
    if (signal?.aborted) {
      return this.failed(cancelledFailure('starting container', signal));
    }

    this.currentPhase = 'locating';
    let alreadyRunning = false;

    if (this.spec.reuse && this.spec.name) {
      alreadyRunning = await this.locateExisting(this.spec.name);
    }

    if (!this.containerId) {
      const created = await this.create(signal);
      if (!created.ok) {
        return this.failed(created);
      }
      this.containerId = created.value;
    }

    if (alreadyRunning) {
      this.logger.info({ containerId: this.containerId }, 'Reused container is already running');
    } else {
      if (signal?.aborted) {
        return this.failed(cancelledFailure('starting container', signal));
      }
      this.currentPhase = 'starting';
      const started = await this.docker.startContainer(this.containerId);
      if (!started.ok) {
        await this.printLogsOnFailure(`start failed: ${started.error}`);
        return this.failed(started);
      }
    }

    this.currentPhase = 'stabilizing';
    const stable = await this.checkStability(signal);
    if (!stable.ok) {
      return this.failed(stable);
    }

    this.running = true;
    this.currentPhase = 'ready';
    this.logger.info({ containerId: this.containerId }, 'Container running');
    return Success(undefined);
  }

  /**
   * Stop the container with the configured grace period. No-op without an id.
   */
  async stop(): Promise<Result<void>> {
    if (!this.containerId) {
      return Success(undefined);
    }

    const stopped = await this.docker.stopContainer(this.containerId, this.stopGraceSeconds);
    if (!stopped.ok) {
      return stopped;
    }

    this.running = false;
    this.logger.debug({ containerId: this.containerId }, 'Container stopped');
    return Success(undefined);
  }

  /**
   * Reuse-enabled handles are only stopped so the next run can pick them up again.
   * Otherwise stop (best effort), force-remove and clear the id.
   */
  async cleanup(): Promise<Result<void>> {
    if (this.spec.reuse) {
      return this.stop();
    }

    if (!this.containerId) {
      return Success(undefined);
    }

    const stopped = await this.stop();
    if (!stopped.ok) {
      this.logger.warn({ containerId: this.containerId, error: stopped.error }, 'Stop before removal failed');
    }

    const removed = await this.docker.removeContainer(this.containerId, true);
    if (!removed.ok) {
      return removed;
    }

    this.logger.debug({ containerId: this.containerId }, 'Container removed');
    this.containerId = '';
    this.running = false;
    this.currentPhase = 'unstarted';
    return Success(undefined);
  }

  /**
   * Ask the engine whether the container is running. `false` when no container exists
   * yet. An inspection error is returned as-is and leaves the id in place.
   */
  async isRunning(): Promise<Result<boolean>> {
    if (!this.containerId) {
      return Success(false);
    }

    const inspected = await this.docker.inspectContainer(this.containerId);
    if (!inspected.ok) {
      return inspected;
    }

    this.running = inspected.value.state.running;
    return Success(this.running);
  }

  /**
   * Host port published for a container port of the spec.
   */
  async getPort(containerPort: number | string): Promise<Result<number>> {
    const key = portKey(containerPort);

    if (!this.publishedPorts.has(key)) {
      const known = [...this.publishedPorts].join(', ') || 'none';
      return Failure(`port ${key} is not published by container ${this.name} (published: ${known})`, {
        message: `Port ${key} is not part of the container spec`,
        resolution: 'Add the port to the spec ports before starting the container',
        details: { port: key, published: [...this.publishedPorts] },
      });
    }

    if (!this.containerId || !this.running) {
      return Failure(`${ERROR_MESSAGES.CONTAINER_NOT_STARTED}: cannot resolve port ${key}`, {
        message: 'Ports are only published once the container is running',
        resolution: 'Call start() before getPort()',
      });
    }

    const inspected = await this.docker.inspectContainer(this.containerId);
    if (!inspected.ok) {
      return inspected;
    }

    const binding = inspected.value.ports[key]?.[0];
    if (!binding) {
      return Failure(`no host binding for port ${key} on container ${this.name}`, {
        message: `The engine has not published port ${key} yet`,
        hint: 'Bindings can lag behind the start call; retry shortly',
        details: { port: key, containerId: this.containerId },
      });
    }

    return Success(binding.hostPort);
  }

  async logs(options: LogOptions = {}): Promise<Result<string>> {
    if (!this.containerId) {
      return Failure(`${ERROR_MESSAGES.CONTAINER_NOT_STARTED}: no logs for ${this.name}`);
    }
    return this.docker.getContainerLogs(this.containerId, options);
  }

  async exec(command: readonly string[]): Promise<Result<ExecResult>> {
    if (!this.containerId) {
      return Failure(`${ERROR_MESSAGES.CONTAINER_NOT_STARTED}: cannot exec in ${this.name}`);
    }
    return this.docker.execInContainer(this.containerId, command);
  }

  /**
   * Emit engine state and recent logs through the logger. Never rejects.
   */
  async printLogsOnFailure(reason: string): Promise<void> {
    await printLogsOnFailure(this.docker, this.logger, this.containerId, reason, this.diagnostics);
  }

  private failed(result: Result<never>): Result<never> {
    this.currentPhase = 'failed';
    return result;
  }

  /**
   * Reuse lookup. A miss or a lookup error falls through to creation.
   * Returns whether the located container is already running.
   */
  private async locateExisting(name: string): Promise<boolean> {
    const found = await this.docker.findContainerByName(name);

    if (!found.ok) {
      this.logger.warn({ name, error: found.error }, 'Reuse lookup failed, creating a new container');
      return false;
    }
    if (!found.value) {
      this.logger.warn({ name }, 'No container to reuse, creating a new one');
      return false;
    }

    this.containerId = found.value.id;
    const running = found.value.state === 'running';
    this.logger.info({ containerId: this.containerId, running }, 'Reusing existing container');
    return running;
  }

  private async create(signal?: AbortSignal): Promise<Result<string>> {
    const present = await this.docker.imageExists(this.spec.image);
    if (!present.ok) {
      return present;
    }

    if (!present.value) {
      const pulled = await this.docker.pullImage(this.spec.image, signal);
      if (!pulled.ok) {
        return pulled;
      }
    }

    if (signal?.aborted) {
      return cancelledFailure('creating container', signal);
    }

    const created = await this.docker.createContainer(this.spec);
    if (created.ok) {
      this.logger.info({ containerId: created.value, image: this.spec.image }, 'Container created');
    }
    return created;
  }

  /**
   * Inspect the container `stability.attempts` times, `intervalMs` apart. The first
   * not-running report ends the check.
   */
  private async checkStability(signal?: AbortSignal): Promise<Result<void>> {
    const { attempts, intervalMs } = this.stability;

    for (let check = 1; check <= attempts; check++) {
      if (signal?.aborted) {
        return cancelledFailure('stability check', signal);
      }

      const inspected = await this.docker.inspectContainer(this.containerId);
      if (!inspected.ok) {
        await this.printLogsOnFailure(`stability check could not inspect container: ${inspected.error}`);
        return Failure(`stability check failed for ${this.name}: ${inspected.error}`, inspected.guidance);
      }

      const { state } = inspected.value;
      if (!state.running) {
        await this.printLogsOnFailure(`container stopped during stability check (check ${check})`);
        return Failure(
          `container ${this.name} exited during stability check (status ${state.status}, exit code ${state.exitCode})`,
          {
            message: 'The container stopped right after it was started',
            hint: 'The process inside the container exited; the logs above show why',
            details: { check, status: state.status, exitCode: state.exitCode, error: state.error },
          },
        );
      }

      if (check < attempts) {
        try {
          await this.sleep(intervalMs, signal);
        } catch (error) {
          if (signal?.aborted || isAbortError(error)) {
            return cancelledFailure('stability check', signal);
          }
          throw error;
        }
      }
    }

    this.logger.debug({ checks: attempts }, 'Container passed stability check');
    return Success(undefined);
  }
}

/**
 * Validate the spec and build a controller for it.
 */
export function createManagedContainer(
  input: ContainerSpecInput,
  options: ManagedContainerOptions,
): Result<ManagedContainer> {
  const spec = parseContainerSpec(input);
  if (!spec.ok) {
    return spec;
  }
  return Success(new ManagedContainer(spec.value, options));
}
