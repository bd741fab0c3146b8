import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { Logger } from 'pino';
import { createHttpServiceContainer, type HttpServiceOptions } from '@/containers/http-service';
import { mustSucceed } from '@/types';
import { FakeDockerClient } from '../../__support__/fakes/docker';
import { startTestServer, type TestServer } from '../../__support__/utilities/http-server';
import { createInstantSleep, createMockLogger } from '../../__support__/utilities/logger';

describe('HttpServiceContainer', () => {
  let docker: FakeDockerClient;
  let logger: Logger;
  let server: TestServer;
  let delays: number[];
  let options: (overrides?: Partial<HttpServiceOptions>) => HttpServiceOptions;

  beforeEach(async () => {
    docker = new FakeDockerClient();
    logger = createMockLogger();
    server = await startTestServer();
    docker.hostPorts = { '8080/tcp': server.port };
    delays = [];
    options = (overrides = {}) => ({
      spec: { image: 'example/web:1.0', name: 'web', ports: { '8080': 0 } },
      port: 8080,
      path: '/healthz',
      ...overrides,
    });
  });

  afterEach(async () => {
    await server.close();
  });

  function deps(): Parameters<typeof createHttpServiceContainer>[1] {
    const instant = createInstantSleep();
    delays = instant.delays;
    return { docker, logger, sleep: instant.sleep, readiness: { attempts: 4, intervalMs: 250 } };
  }

  it('polls the readiness path until it answers with an accepted status', async () => {
    let calls = 0;
    server.respond(() => ({ status: ++calls < 3 ? 503 : 200 }));
    const service = mustSucceed(createHttpServiceContainer(options(), deps()));

    mustSucceed(await service.start());

    expect(service.getUrl()).toBe(`http://localhost:${server.port}`);
    expect(server.requests.map((request) => request.url)).toEqual(['/healthz', '/healthz', '/healthz']);
    expect(delays.filter((ms) => ms === 250)).toHaveLength(2);
    mustSucceed(await service.healthCheck());
  });

  it('accepts only the listed statuses', async () => {
    server.respond(() => ({ status: 200 }));
    const service = mustSucceed(
      createHttpServiceContainer(options({ acceptStatus: [204], description: 'Orders API' }), deps()),
    );

    const result = await service.start();

    expect(result).toMatchObject({ ok: false, error: 'Orders API failed to become ready after 4 attempts' });
  });

  it('counts redirects as ready without following them', async () => {
    server.respond(() => ({ status: 302, headers: { Location: '/login' } }));
    const service = mustSucceed(createHttpServiceContainer(options(), deps()));

    mustSucceed(await service.start());

    expect(server.requests).toHaveLength(1);
  });

  it('fails when the readiness port is not part of the spec', async () => {
    const service = mustSucceed(createHttpServiceContainer(options({ port: 9090 }), deps()));

    const result = await service.start();

    expect(result).toMatchObject({
      ok: false,
      error:
        'failed to get HTTP service port: port 9090/tcp is not published by container web (published: 8080/tcp)',
    });
  });

  it('rejects an invalid spec', () => {
    const result = createHttpServiceContainer(options({ spec: { image: '' } }), deps());

    expect(result).toMatchObject({ ok: false, error: 'Invalid container spec: image: image is required' });
  });

  it('delegates lifecycle calls to the container', async () => {
    const service = mustSucceed(createHttpServiceContainer(options(), deps()));
    mustSucceed(await service.start());

    expect(await service.isRunning()).toEqual({ ok: true, value: true });
    expect(await service.getPort(8080)).toEqual({ ok: true, value: server.port });
    expect(await service.exec(['cat', '/etc/hostname'])).toEqual({
      ok: true,
      value: { exitCode: 0, stdout: 'cat /etc/hostname', stderr: '' },
    });

    mustSucceed(await service.cleanup());

    expect(service.getId()).toBe('');
    expect(docker.containers.size).toBe(0);
  });
});
