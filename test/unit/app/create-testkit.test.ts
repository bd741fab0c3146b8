import { describe, it, expect, beforeEach } from '@jest/globals';
import type { Logger } from 'pino';
import { createTestkit, type ContainerOverrides, type Testkit } from '@/app';
import { CatalogClient } from '@/infra/http/catalog-client';
import { Kubectl } from '@/infra/kubernetes/kubectl';
import { mustSucceed } from '@/types';
import { FakeDockerClient } from '../../__support__/fakes/docker';
import { FakeCommandRunner } from '../../__support__/fakes/runner';
import { createInstantSleep, createMockLogger } from '../../__support__/utilities/logger';

describe('createTestkit', () => {
  let docker: FakeDockerClient;
  let runner: FakeCommandRunner;
  let logger: Logger;

  beforeEach(() => {
    docker = new FakeDockerClient();
    runner = new FakeCommandRunner();
    logger = createMockLogger();
  });

  function kit(env: NodeJS.ProcessEnv = {}): Testkit {
    const { sleep } = createInstantSleep();
    return mustSucceed(createTestkit({ env, docker, runner, logger, sleep }));
  }

  it('loads configuration from the given environment', () => {
    const testkit = kit({ TESTKIT_REUSE: 'yes', TESTKIT_KIND_NODE_VERSION: 'v1.30.0', TESTKIT_LOG_LEVEL: 'debug' });

    expect(testkit.config).toEqual({ logLevel: 'debug', reuse: true, kindNodeVersion: 'v1.30.0' });
    expect(testkit.docker).toBe(docker);
    expect(testkit.runner).toBe(runner);
    expect(testkit.logger).toBe(logger);
  });

  it('applies explicit overrides over the environment', () => {
    const testkit = mustSucceed(
      createTestkit({ env: { TESTKIT_REUSE: 'true' }, config: { reuse: false }, docker, runner, logger }),
    );

    expect(testkit.config.reuse).toBe(false);
  });

  it('returns configuration errors', () => {
    const result = createTestkit({ env: { TESTKIT_LOG_LEVEL: 'loud' }, docker, runner, logger });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith('Invalid environment configuration: TESTKIT_LOG_LEVEL: ')).toBe(true);
    }
  });

  describe('reuse default', () => {
    it('applies to named containers without an explicit choice', () => {
      const container = mustSucceed(kit({ TESTKIT_REUSE: 'true' }).container({ image: 'example/app:1.0', name: 'app' }));

      expect(container.getSpec().reuse).toBe(true);
    });

    it('leaves unnamed containers alone', () => {
      const container = mustSucceed(kit({ TESTKIT_REUSE: 'true' }).container({ image: 'example/app:1.0' }));

      expect(container.getSpec().reuse).toBe(false);
    });

    it('keeps an explicit choice', () => {
      const container = mustSucceed(
        kit({ TESTKIT_REUSE: 'true' }).container({ image: 'example/app:1.0', name: 'app', reuse: false }),
      );

      expect(container.getSpec().reuse).toBe(false);
    });

    it('reaches workload factories', () => {
      const db = mustSucceed(kit({ TESTKIT_REUSE: 'true' }).sqlServer({ name: 'db', password: 'test-secret' }));

      expect(db.getContainer().getSpec().reuse).toBe(true);
    });
  });

  it('passes stability overrides to the container', async () => {
    const { sleep, delays } = createInstantSleep();
    const testkit = mustSucceed(createTestkit({ env: {}, docker, runner, logger, sleep }));
    const overrides: ContainerOverrides = { stability: { attempts: 2, intervalMs: 5 } };
    const container = mustSucceed(testkit.container({ image: 'example/app:1.0' }, overrides));

    mustSucceed(await container.start());

    expect(delays).toEqual([5]);
  });

  it('defaults kind clusters to the configured node version', async () => {
    runner.on('kubectl', {
      stdout: JSON.stringify({
        items: [{ metadata: { name: 'e2e-control-plane' }, status: { conditions: [{ type: 'Ready', status: 'True' }] } }],
      }),
    });
    const cluster = kit({ TESTKIT_KIND_NODE_VERSION: 'v1.29.2' }).kind({ name: 'e2e' });

    mustSucceed(await cluster.getOrCreate());

    expect(runner.lines[1]).toBe('kind create cluster --name e2e --image kindest/node:v1.29.2');
  });

  it('binds helm and namespaces to the given kubectl', async () => {
    const testkit = kit();
    const kubectl = new Kubectl(runner, logger, { context: 'kind-e2e' });

    mustSucceed(await testkit.namespace('orders', kubectl).create());
    mustSucceed(await testkit.helm('./charts/orders').release('orders').uninstall());

    expect(runner.lines).toEqual([
      'kubectl --context kind-e2e create namespace orders',
      'helm uninstall --namespace default orders --wait=false',
    ]);
  });

  it('creates catalog clients', () => {
    expect(kit().catalog({ url: 'http://127.0.0.1:8080' })).toBeInstanceOf(CatalogClient);
  });
});
