/**
 * Container engine adapter
 *
 * Every engine call the toolkit makes goes through this module. It talks to the daemon
 * API through dockerode and returns structured records, so nothing downstream parses CLI
 * output.
 */

import Docker, { type ContainerCreateOptions, type DockerOptions } from 'dockerode';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS, DOCKER } from '@/config/constants';
import { cancelledFailure } from '@/lib/errors';
import { Success, Failure, type Result } from '@/types';
import {
  portKey,
  type ContainerInspection,
  type ContainerSpec,
  type ContainerSummary,
  type ExecResult,
  type LogOptions,
  type PortBinding,
} from '@/containers/types';
import { extractDockerErrorGuidance, isDockerStatus } from './errors';
import { demuxLogs } from './logs';
import { autoDetectDockerSocket } from './socket-validation';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Docker socket path or `tcp://host:port` (defaults to auto-detection) */
  socketPath?: string;
  /** Connection timeout in milliseconds */
  timeout?: number;
}

/**
 * Engine operations the lifecycle controller depends on.
 */
export interface DockerClient {
  /** Whether the image is present locally */
  imageExists: (image: string) => Promise<Result<boolean>>;

  pullImage: (image: string, signal?: AbortSignal) => Promise<Result<void>>;

  /** Create a container from a spec. Returns the container id */
  createContainer: (spec: ContainerSpec) => Promise<Result<string>>;

  /** Start a container. Starting a running container succeeds */
  startContainer: (containerId: string) => Promise<Result<void>>;

  /** Stop with a grace period. Stopping a stopped container succeeds */
  stopContainer: (containerId: string, graceSeconds?: number) => Promise<Result<void>>;

  removeContainer: (containerId: string, force?: boolean) => Promise<Result<void>>;

  inspectContainer: (containerId: string) => Promise<Result<ContainerInspection>>;

  /**
   * Find a container (running or not) whose name matches exactly.
   * Resolves to `undefined` when there is none.
   */
  findContainerByName: (name: string) => Promise<Result<ContainerSummary | undefined>>;

  listContainers: (options?: {
    all?: boolean;
    filters?: Record<string, string[]>;
  }) => Promise<Result<ContainerSummary[]>>;

  /** Combined stdout and stderr */
  getContainerLogs: (containerId: string, options?: LogOptions) => Promise<Result<string>>;

  execInContainer: (containerId: string, command: readonly string[]) => Promise<Result<ExecResult>>;
}

function stripSlash(name: string): string {
  return name.startsWith('/') ? name.slice(1) : name;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Map a spec to the engine create payload. A requested host port of `0` becomes an
 * empty `HostPort`, which tells the engine to assign one.
 */
export function buildCreateContainerOptions(spec: ContainerSpec): ContainerCreateOptions {
  const exposedPorts: Record<string, object> = {};
  const portBindings: Record<string, Array<{ HostPort: string }>> = {};

  for (const [port, hostPort] of Object.entries(spec.ports)) {
    const key = portKey(port);
    exposedPorts[key] = {};
    portBindings[key] = [{ HostPort: hostPort === 0 ? '' : String(hostPort) }];
  }

  const options: ContainerCreateOptions = {
    Image: spec.image,
    Env: [...spec.env],
    ExposedPorts: exposedPorts,
    HostConfig: {
      PortBindings: portBindings,
      Mounts: spec.mounts.map((mount) => ({
        Type: mount.type,
        Source: mount.source,
        Target: mount.target,
        ReadOnly: mount.readOnly,
      })),
    },
  };

  if (spec.name) {
    options.name = spec.name;
  }
  if (spec.command) {
    options.Cmd = [...spec.command];
  }

  return options;
}

function toPortBindings(
  ports: Record<string, Array<{ HostIp?: string; HostPort?: string }> | null> | undefined,
): Record<string, PortBinding[]> {
  const result: Record<string, PortBinding[]> = {};
  for (const [key, bindings] of Object.entries(ports ?? {})) {
    result[key] = (bindings ?? [])
      .map((binding) => ({ hostIp: binding.HostIp ?? '', hostPort: Number(binding.HostPort) }))
      .filter((binding) => Number.isInteger(binding.hostPort) && binding.hostPort > 0);
  }
  return result;
}

function destroyStream(stream: NodeJS.ReadableStream): void {
  if ('destroy' in stream && typeof stream.destroy === 'function') {
    stream.destroy();
  }
}

function toSummary(container: Docker.ContainerInfo): ContainerSummary {
  return {
    id: container.Id,
    names: container.Names.map(stripSlash),
    image: container.Image,
    state: container.State,
    status: container.Status,
  };
}

/**
 * Create the engine adapter over an existing dockerode instance.
 */
export function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  const fail = (
    operation: string,
    error: unknown,
    context: Record<string, unknown>,
  ): Result<never> => {
    const guidance = extractDockerErrorGuidance(error);
    const errorMessage = `Failed to ${operation}: ${guidance.message}`;

    logger.error(
      {
        error: errorMessage,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
        ...context,
      },
      `Docker ${operation} failed`,
    );

    return Failure(errorMessage, guidance);
  };

  const listContainers: DockerClient['listContainers'] = async (options = {}) => {
    try {
      logger.debug({ options }, 'Listing Docker containers');
      const containers = await docker.listContainers(options);
      logger.debug({ containerCount: containers.length }, 'Docker containers listed');
      return Success(containers.map(toSummary));
    } catch (error) {
      return fail('list containers', error, { options });
    }
  };

  return {
    async imageExists(image: string): Promise<Result<boolean>> {
      try {
        await docker.getImage(image).inspect();
        return Success(true);
      } catch (error) {
        if (isDockerStatus(error, 404)) {
          return Success(false);
        }
        return fail('inspect image', error, { image });
      }
    },

    async pullImage(image: string, signal?: AbortSignal): Promise<Result<void>> {
      if (signal?.aborted) {
        return cancelledFailure(`pulling ${image}`, signal);
      }

      try {
        logger.info({ image }, 'Pulling image');
        const stream = await docker.pull(image);

        // The signal may have fired while the pull request was pending.
        if (signal?.aborted) {
          destroyStream(stream);
          return cancelledFailure(`pulling ${image}`, signal);
        }

        await new Promise<void>((resolve, reject) => {
          const onAbort = (): void => {
            destroyStream(stream);
            reject(signal?.reason ?? new Error('Image pull aborted'));
          };
          signal?.addEventListener('abort', onAbort, { once: true });

          docker.modem.followProgress(
            stream,
            (err: Error | null) => {
              signal?.removeEventListener('abort', onAbort);
              if (err) {
                reject(err);
              } else {
                resolve();
              }
            },
            (event: { status?: string; progress?: string; id?: string }) => {
              logger.trace({ image, ...event }, 'Image pull progress');
            },
          );
        });

        logger.info({ image }, 'Image pulled');
        return Success(undefined);
      } catch (error) {
        if (signal?.aborted) {
          return cancelledFailure(`pulling ${image}`, signal);
        }
        return fail('pull image', error, { image });
      }
    },

    async createContainer(spec: ContainerSpec): Promise<Result<string>> {
      try {
        const options = buildCreateContainerOptions(spec);
        logger.debug({ image: spec.image, name: spec.name, ports: spec.ports }, 'Creating container');

        const container = await docker.createContainer(options);

        logger.debug({ containerId: container.id, name: spec.name }, 'Container created');
        return Success(container.id);
      } catch (error) {
        return fail('create container', error, { image: spec.image, name: spec.name });
      }
    },

    async startContainer(containerId: string): Promise<Result<void>> {
      try {
        await docker.getContainer(containerId).start();
        logger.debug({ containerId }, 'Container started');
        return Success(undefined);
      } catch (error) {
        if (isDockerStatus(error, 304)) {
          logger.debug({ containerId }, 'Container already running');
          return Success(undefined);
        }
        return fail('start container', error, { containerId });
      }
    },

    async stopContainer(
      containerId: string,
      graceSeconds: number = DEFAULT_TIMEOUTS.containerStopGraceSeconds,
    ): Promise<Result<void>> {
      try {
        await docker.getContainer(containerId).stop({ t: graceSeconds });
        logger.debug({ containerId }, 'Container stopped');
        return Success(undefined);
      } catch (error) {
        if (isDockerStatus(error, 304)) {
          logger.debug({ containerId }, 'Container already stopped');
          return Success(undefined);
        }
        return fail('stop container', error, { containerId });
      }
    },

    async removeContainer(containerId: string, force = false): Promise<Result<void>> {
      try {
        logger.debug({ containerId, force }, 'Removing container');
        await docker.getContainer(containerId).remove({ force });
        logger.debug({ containerId }, 'Container removed');
        return Success(undefined);
      } catch (error) {
        return fail('remove container', error, { containerId });
      }
    },

    async inspectContainer(containerId: string): Promise<Result<ContainerInspection>> {
      try {
        const info = await docker.getContainer(containerId).inspect();
        return Success({
          id: info.Id,
          name: stripSlash(info.Name),
          image: info.Config.Image,
          state: {
            status: info.State.Status,
            running: info.State.Running,
            exitCode: info.State.ExitCode,
            error: info.State.Error,
            startedAt: info.State.StartedAt,
            finishedAt: info.State.FinishedAt,
          },
          ports: toPortBindings(info.NetworkSettings.Ports),
        });
      } catch (error) {
        return fail('inspect container', error, { containerId });
      }
    },

    async findContainerByName(name: string): Promise<Result<ContainerSummary | undefined>> {
      const listed = await listContainers({
        all: true,
        filters: { name: [`^/?${escapeRegExp(name)}$`] },
      });
      if (!listed.ok) {
        return listed;
      }
      return Success(listed.value.find((container) => container.names.includes(name)));
    },

    listContainers,

    async getContainerLogs(containerId: string, options: LogOptions = {}): Promise<Result<string>> {
      try {
        const buffer = await docker.getContainer(containerId).logs({
          stdout: true,
          stderr: true,
          follow: false,
          timestamps: options.timestamps ?? false,
          ...(options.tail !== undefined && { tail: options.tail }),
        });
        return Success(demuxLogs(buffer).combined);
      } catch (error) {
        return fail('get container logs', error, { containerId });
      }
    },

    async execInContainer(
      containerId: string,
      command: readonly string[],
    ): Promise<Result<ExecResult>> {
      try {
        logger.debug({ containerId, command }, 'Executing command in container');

        const exec = await docker.getContainer(containerId).exec({
          Cmd: [...command],
          AttachStdout: true,
          AttachStderr: true,
        });
        const stream = await exec.start({ hijack: true, stdin: false });

        const chunks: Buffer[] = [];
        stream.on('data', (chunk: Buffer) => chunks.push(chunk));

        await new Promise<void>((resolve, reject) => {
          stream.once('end', () => resolve());
          stream.once('close', () => resolve());
          stream.once('error', reject);
        });

        const output = demuxLogs(Buffer.concat(chunks));
        const inspection = await exec.inspect();
        return Success({
          exitCode: inspection.ExitCode ?? 0,
          stdout: output.stdout,
          stderr: output.stderr,
        });
      } catch (error) {
        return fail('exec in container', error, { containerId, command });
      }
    },
  };
}

/**
 * Create a Docker client with the engine endpoint resolved from config or the
 * environment.
 */
export const createDockerClient = (logger: Logger, config?: DockerClientConfig): DockerClient => {
  let socketPath: string;

  if (config?.socketPath) {
    socketPath = config.socketPath;
  } else {
    socketPath = autoDetectDockerSocket();
    logger.debug({ socketPath }, 'Auto-detected Docker socket');
  }

  const dockerOptions: DockerOptions = {};

  if (socketPath.startsWith('tcp://') || socketPath.startsWith('http://')) {
    const url = new URL(socketPath.replace(/^tcp:/, 'http:'));
    dockerOptions.host = url.hostname;
    dockerOptions.port = url.port ? Number(url.port) : DOCKER.DEFAULT_TCP_PORT;
  } else {
    dockerOptions.socketPath = socketPath.replace(/^unix:\/\//, '');
  }

  if (config?.timeout) {
    dockerOptions.timeout = config.timeout;
  }

  const docker = new Docker(dockerOptions);

  logger.debug({ dockerOptions }, 'Created Docker client');

  return createBaseDockerClient(docker, logger);
};
