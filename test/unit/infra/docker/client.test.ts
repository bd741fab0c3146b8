/**
 * Engine adapter tests over a stubbed dockerode instance
 */

import { PassThrough } from 'node:stream';
import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import type Docker from 'dockerode';
import type { Logger } from 'pino';
import { buildCreateContainerOptions, createBaseDockerClient, type DockerClient } from '@/infra/docker/client';
import { mustSucceed } from '@/types';
import { parseContainerSpec } from '@/containers/schema';
import { createMockLogger } from '../../../__support__/utilities/logger';

function engineError(statusCode: number, message: string): Error {
  return Object.assign(new Error(`(HTTP code ${statusCode}) ${message}`), {
    statusCode,
    json: { message },
  });
}

interface EngineExec {
  start: (options: unknown) => Promise<PassThrough>;
  inspect: () => Promise<{ ExitCode: number | null }>;
}

function frame(stream: 1 | 2, text: string): Buffer {
  const payload = Buffer.from(text, 'utf8');
  const header = Buffer.alloc(8);
  header.writeUInt8(stream, 0);
  header.writeUInt32BE(payload.length, 4);
  return Buffer.concat([header, payload]);
}

describe('buildCreateContainerOptions', () => {
  it('maps ports, env, mounts, name and command', () => {
    const spec = mustSucceed(
      parseContainerSpec({
        image: 'example/app:1.0',
        name: 'app',
        ports: { '8080': 0, '53/udp': 5353 },
        env: ['MODE=test'],
        mounts: [{ source: '/tmp/conf', target: '/etc/app', readOnly: true }],
        command: ['serve', '--verbose'],
      }),
    );

    expect(buildCreateContainerOptions(spec)).toEqual({
      Image: 'example/app:1.0',
      name: 'app',
      Cmd: ['serve', '--verbose'],
      Env: ['MODE=test'],
      ExposedPorts: { '8080/tcp': {}, '53/udp': {} },
      HostConfig: {
        PortBindings: {
          '8080/tcp': [{ HostPort: '' }],
          '53/udp': [{ HostPort: '5353' }],
        },
        Mounts: [{ Type: 'bind', Source: '/tmp/conf', Target: '/etc/app', ReadOnly: true }],
      },
    });
  });

  it('leaves out name and command when the spec has none', () => {
    const options = buildCreateContainerOptions(mustSucceed(parseContainerSpec({ image: 'example/app:1.0' })));

    expect(options).not.toHaveProperty('name');
    expect(options).not.toHaveProperty('Cmd');
  });
});

describe('createBaseDockerClient', () => {
  let logger: Logger;
  let container: {
    start: jest.Mock<() => Promise<void>>;
    stop: jest.Mock<(options: { t: number }) => Promise<void>>;
    remove: jest.Mock<(options: { force: boolean }) => Promise<void>>;
    inspect: jest.Mock<() => Promise<unknown>>;
    logs: jest.Mock<(options: Record<string, unknown>) => Promise<Buffer>>;
    exec: jest.Mock<(options: unknown) => Promise<EngineExec>>;
  };
  let engine: {
    getImage: jest.Mock<() => { inspect: () => Promise<unknown> }>;
    getContainer: jest.Mock<(id: string) => typeof container>;
    listContainers: jest.Mock<(options: unknown) => Promise<unknown[]>>;
    createContainer: jest.Mock<(options: unknown) => Promise<{ id: string }>>;
    pull: jest.Mock<(image: string) => Promise<PassThrough>>;
    modem: { followProgress: jest.Mock<(stream: unknown, onFinished: (err: Error | null) => void) => void> };
  };
  let client: DockerClient;

  beforeEach(() => {
    logger = createMockLogger();
    container = {
      start: jest.fn<() => Promise<void>>(async () => undefined),
      stop: jest.fn<(options: { t: number }) => Promise<void>>(async () => undefined),
      remove: jest.fn<(options: { force: boolean }) => Promise<void>>(async () => undefined),
      inspect: jest.fn<() => Promise<unknown>>(async () => ({})),
      logs: jest.fn<(options: Record<string, unknown>) => Promise<Buffer>>(async () => Buffer.alloc(0)),
      exec: jest.fn<(options: unknown) => Promise<EngineExec>>(),
    };
    engine = {
      getImage: jest.fn<() => { inspect: () => Promise<unknown> }>(() => ({ inspect: async () => ({}) })),
      getContainer: jest.fn<(id: string) => typeof container>(() => container),
      listContainers: jest.fn<(options: unknown) => Promise<unknown[]>>(async () => []),
      createContainer: jest.fn<(options: unknown) => Promise<{ id: string }>>(async () => ({ id: 'created-id' })),
      pull: jest.fn<(image: string) => Promise<PassThrough>>(async () => new PassThrough()),
      modem: {
        followProgress: jest.fn<(stream: unknown, onFinished: (err: Error | null) => void) => void>(
          (_stream, onFinished) => onFinished(null),
        ),
      },
    };
    client = createBaseDockerClient(engine as unknown as Docker, logger);
  });

  it('reports a missing image as absent rather than failed', async () => {
    engine.getImage.mockReturnValue({
      inspect: async () => {
        throw engineError(404, 'No such image: example/app:1.0');
      },
    });

    expect(await client.imageExists('example/app:1.0')).toEqual({ ok: true, value: false });
  });

  it('wraps other image errors with guidance', async () => {
    engine.getImage.mockReturnValue({
      inspect: async () => {
        throw Object.assign(new Error('connect ENOENT /var/run/docker.sock'), { code: 'ENOENT' });
      },
    });

    const result = await client.imageExists('example/app:1.0');

    expect(result).toMatchObject({
      ok: false,
      error: 'Failed to inspect image: Cannot connect to the Docker daemon',
      guidance: { hint: 'The Docker daemon is not running or the socket path is wrong' },
    });
  });

  it('returns the created container id', async () => {
    const spec = mustSucceed(parseContainerSpec({ image: 'example/app:1.0', name: 'app' }));

    expect(await client.createContainer(spec)).toEqual({ ok: true, value: 'created-id' });
    expect(engine.createContainer).toHaveBeenCalledWith(buildCreateContainerOptions(spec));
  });

  it('explains name conflicts on create', async () => {
    engine.createContainer.mockRejectedValue(engineError(409, 'Conflict. The container name "/app" is already in use'));
    const spec = mustSucceed(parseContainerSpec({ image: 'example/app:1.0', name: 'app' }));

    const result = await client.createContainer(spec);

    expect(result).toMatchObject({
      ok: false,
      error: 'Failed to create container: Conflict. The container name "/app" is already in use',
      guidance: { resolution: 'Remove the conflicting container or enable reuse' },
    });
  });

  it('treats 304 on start and stop as success', async () => {
    container.start.mockRejectedValue(engineError(304, 'container already started'));
    container.stop.mockRejectedValue(engineError(304, 'container already stopped'));

    expect(await client.startContainer('abc')).toEqual({ ok: true, value: undefined });
    expect(await client.stopContainer('abc')).toEqual({ ok: true, value: undefined });
  });

  it('stops with the default 30 second grace period', async () => {
    await client.stopContainer('abc');

    expect(container.stop).toHaveBeenCalledWith({ t: 30 });
  });

  it('passes the force flag on removal', async () => {
    await client.removeContainer('abc', true);

    expect(container.remove).toHaveBeenCalledWith({ force: true });
  });

  it('maps inspection into a structured record', async () => {
    container.inspect.mockResolvedValue({
      Id: 'abc',
      Name: '/broker',
      Config: { Image: 'example/broker:1.0' },
      State: {
        Status: 'running',
        Running: true,
        ExitCode: 0,
        Error: '',
        StartedAt: '2024-01-01T00:00:00Z',
        FinishedAt: '0001-01-01T00:00:00Z',
      },
      NetworkSettings: {
        Ports: {
          '8161/tcp': [{ HostIp: '0.0.0.0', HostPort: '32768' }],
          '1099/tcp': null,
        },
      },
    });

    expect(await client.inspectContainer('abc')).toEqual({
      ok: true,
      value: {
        id: 'abc',
        name: 'broker',
        image: 'example/broker:1.0',
        state: {
          status: 'running',
          running: true,
          exitCode: 0,
          error: '',
          startedAt: '2024-01-01T00:00:00Z',
          finishedAt: '0001-01-01T00:00:00Z',
        },
        ports: {
          '8161/tcp': [{ hostIp: '0.0.0.0', hostPort: 32768 }],
          '1099/tcp': [],
        },
      },
    });
  });

  it('finds containers by exact name only', async () => {
    engine.listContainers.mockResolvedValue([
      { Id: '1', Names: ['/db-replica'], Image: 'db', State: 'running', Status: 'Up' },
      { Id: '2', Names: ['/db'], Image: 'db', State: 'exited', Status: 'Exited (0)' },
    ]);

    const result = await client.findContainerByName('db');

    expect(result).toEqual({
      ok: true,
      value: { id: '2', names: ['db'], image: 'db', state: 'exited', status: 'Exited (0)' },
    });
    expect(engine.listContainers).toHaveBeenCalledWith({ all: true, filters: { name: ['^/?db$'] } });
  });

  it('resolves to undefined when no container has the name', async () => {
    expect(await client.findContainerByName('missing')).toEqual({ ok: true, value: undefined });
  });

  it('decodes multiplexed logs', async () => {
    container.logs.mockResolvedValue(Buffer.concat([frame(1, 'started\n'), frame(2, 'warning\n')]));

    const result = await client.getContainerLogs('abc', { tail: 50 });

    expect(result).toEqual({ ok: true, value: 'started\nwarning\n' });
    expect(container.logs).toHaveBeenCalledWith({
      stdout: true,
      stderr: true,
      follow: false,
      timestamps: false,
      tail: 50,
    });
  });

  it('returns a cancellation failure for an aborted pull without calling the engine', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await client.pullImage('example/app:1.0', controller.signal);

    expect(result).toMatchObject({ ok: false, error: 'Operation cancelled: pulling example/app:1.0' });
  });

  it('pulls an image and follows progress to the end', async () => {
    mustSucceed(await client.pullImage('example/app:1.0'));

    expect(engine.pull).toHaveBeenCalledWith('example/app:1.0');
    expect(engine.modem.followProgress).toHaveBeenCalledTimes(1);
  });

  it('stops a pull when the signal aborts while the request is pending', async () => {
    const controller = new AbortController();
    const stream = new PassThrough();
    engine.pull.mockImplementation(async () => {
      controller.abort();
      return stream;
    });

    const result = await client.pullImage('example/app:1.0', controller.signal);

    expect(result).toMatchObject({ ok: false, error: 'Operation cancelled: pulling example/app:1.0' });
    expect(engine.modem.followProgress).not.toHaveBeenCalled();
    expect(stream.destroyed).toBe(true);
  });

  it('splits exec output into stdout and stderr', async () => {
    const output = new PassThrough();
    output.end(Buffer.concat([frame(1, 'ready\n'), frame(2, 'deprecated flag\n'), frame(1, 'done\n')]));
    container.exec.mockResolvedValue({
      start: async () => output,
      inspect: async () => ({ ExitCode: 3 }),
    });

    const result = await client.execInContainer('abc', ['sh', '-c', 'run']);

    expect(result).toEqual({
      ok: true,
      value: { exitCode: 3, stdout: 'ready\ndone\n', stderr: 'deprecated flag\n' },
    });
    expect(container.exec).toHaveBeenCalledWith({
      Cmd: ['sh', '-c', 'run'],
      AttachStdout: true,
      AttachStderr: true,
    });
  });
});
