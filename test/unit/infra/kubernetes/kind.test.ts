import { describe, it, expect, afterEach } from '@jest/globals';
import { readFileSync, rmSync, statSync } from 'node:fs';
import { KindCluster } from '@/infra/kubernetes/kind';
import { mustSucceed } from '@/types';
import { FakeCommandRunner } from '../../../__support__/fakes/runner';
import { createInstantSleep, createMockLogger } from '../../../__support__/utilities/logger';

function nodes(...ready: boolean[]): string {
  return JSON.stringify({
    items: ready.map((isReady, index) => ({
      metadata: { name: `e2e-node-${index}` },
      status: { conditions: [{ type: 'Ready', status: isReady ? 'True' : 'False' }] },
    })),
  });
}

describe('KindCluster', () => {
  const written: string[] = [];

  afterEach(() => {
    for (const path of written.splice(0)) {
      rmSync(path, { force: true });
    }
  });

  it('matches existing clusters by exact name', async () => {
    const runner = new FakeCommandRunner().on('kind get clusters', { stdout: 'e2e-old\nother\n' });

    expect(await new KindCluster(runner, createMockLogger(), { name: 'e2e' }).exists()).toEqual({
      ok: true,
      value: false,
    });
    expect(await new KindCluster(runner, createMockLogger(), { name: 'other' }).exists()).toEqual({
      ok: true,
      value: true,
    });
  });

  it('reuses an existing cluster', async () => {
    const runner = new FakeCommandRunner().on('kind get clusters', { stdout: 'e2e\n' });
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e' });

    expect(await cluster.getOrCreate()).toEqual({ ok: true, value: { created: false } });
    expect(runner.lines).toEqual(['kind get clusters']);
  });

  it('creates the cluster with the requested node image and waits for Ready nodes', async () => {
    const { sleep, delays } = createInstantSleep();
    const runner = new FakeCommandRunner()
      .once('kubectl --context kind-e2e get nodes', { stdout: nodes(true, false) })
      .on('kubectl --context kind-e2e get nodes', { stdout: nodes(true, true) });
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e', version: 'v1.30.0', sleep });

    const result = await cluster.getOrCreate();

    expect(result).toEqual({ ok: true, value: { created: true } });
    expect(runner.lines).toEqual([
      'kind get clusters',
      'kind create cluster --name e2e --image kindest/node:v1.30.0',
      'kubectl --context kind-e2e get nodes -o json',
      'kubectl --context kind-e2e get nodes -o json',
    ]);
    expect(delays).toEqual([2000]);
  });

  it('uses the default node image for latest', async () => {
    const runner = new FakeCommandRunner().on('kubectl', { stdout: nodes(true) });
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e', version: 'latest' });

    mustSucceed(await cluster.getOrCreate());

    expect(runner.lines).toContain('kind create cluster --name e2e');
  });

  it('fails when nodes never become ready', async () => {
    const { sleep } = createInstantSleep();
    const runner = new FakeCommandRunner().on('kubectl', { stdout: nodes(false) });
    const cluster = new KindCluster(runner, createMockLogger(), {
      name: 'e2e',
      readiness: { attempts: 3, intervalMs: 10 },
      sleep,
    });

    const result = await cluster.getOrCreate();

    expect(result).toMatchObject({ ok: false, error: 'kind cluster e2e failed to become ready after 3 attempts' });
  });

  it('returns the create error', async () => {
    const runner = new FakeCommandRunner().on('kind create cluster', {
      exitCode: 1,
      stderr: 'ERROR: failed to create cluster: node(s) already exist\n',
    });
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e' });

    const result = await cluster.getOrCreate();

    expect(result).toMatchObject({
      ok: false,
      error: 'Failed to create kind cluster e2e: ERROR: failed to create cluster: node(s) already exist',
    });
  });

  it('exports the kubeconfig, switches context and checks the API server', async () => {
    const runner = new FakeCommandRunner();
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e' });

    mustSucceed(await cluster.use());

    expect(runner.lines).toEqual([
      'kind export kubeconfig --name e2e',
      'kubectl config use-context kind-e2e',
      'kubectl cluster-info --context kind-e2e',
    ]);
  });

  it('loads images into the cluster', async () => {
    const runner = new FakeCommandRunner();
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e' });

    mustSucceed(await cluster.loadImage('example/app:dev'));

    expect(runner.lines).toEqual(['kind load docker-image example/app:dev --name e2e']);
  });

  it('binds kubectl to a private kubeconfig file', async () => {
    const runner = new FakeCommandRunner().on('kind get kubeconfig', { stdout: 'apiVersion: v1\nkind: Config\n' });
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e' });

    const kubectl = mustSucceed(await cluster.kubectl());
    const path = mustSucceed(await cluster.writeKubeconfig());
    written.push(path);

    expect(readFileSync(path, 'utf8')).toBe('apiVersion: v1\nkind: Config\n');
    if (process.platform !== 'win32') {
      expect(statSync(path).mode & 0o777).toBe(0o600);
    }
    expect(kubectl.buildArgs(['get', 'pods'])).toEqual([
      '--context',
      'kind-e2e',
      '--kubeconfig',
      path,
      'get',
      'pods',
    ]);
    expect(runner.lines.filter((line) => line.startsWith('kind get kubeconfig'))).toHaveLength(1);
  });

  it('deletes the cluster', async () => {
    const runner = new FakeCommandRunner();
    const cluster = new KindCluster(runner, createMockLogger(), { name: 'e2e' });

    mustSucceed(await cluster.delete());

    expect(runner.lines).toEqual(['kind delete cluster --name e2e']);
  });
});
