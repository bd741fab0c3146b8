/**
 * kind cluster manager
 */

import { writeFileSync } from 'node:fs';
import type { Logger } from 'pino';
import tmp from 'tmp';
import { IMAGES, KUBERNETES, RETRY } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { pollUntil, type RetryPolicy, type SleepFn } from '@/lib/poll';
import { runChecked, type CommandRunner } from '@/infra/process/runner';
import { Success, Failure, type Result } from '@/types';
import { Kubectl } from './kubectl';
import { nodeListSchema } from './object';

export interface KindClusterOptions {
  /** Cluster name, default `kind` */
  name?: string;
  /** kindest/node tag; `latest` or empty uses kind's default node image */
  version?: string;
  /** Node readiness budget, default 30 × 2 s */
  readiness?: RetryPolicy;
  sleep?: SleepFn;
}

export class KindCluster {
  readonly name: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly version: string | undefined;
  private readonly readiness: RetryPolicy;
  private readonly sleep: SleepFn | undefined;
  private kubeconfigPath: string | undefined;
  private boundKubectl: Kubectl | undefined;

  constructor(runner: CommandRunner, logger: Logger, options: KindClusterOptions = {}) {
    this.name = options.name ?? KUBERNETES.DEFAULT_KIND_CLUSTER;
    this.runner = runner;
    this.logger = logger.child({ cluster: this.name });
    this.version = options.version && options.version !== 'latest' ? options.version : undefined;
    this.readiness = options.readiness ?? RETRY.KIND_NODES;
    this.sleep = options.sleep;
  }

  /** kubectl context kind writes for this cluster */
  get contextName(): string {
    return `${KUBERNETES.KIND_CONTEXT_PREFIX}${this.name}`;
  }

  async exists(): Promise<Result<boolean>> {
    const result = await runChecked(this.runner, 'kind', ['get', 'clusters'], 'kind get clusters');
    if (!result.ok) {
      return result;
    }
    const clusters = result.value.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
    return Success(clusters.includes(this.name));
  }

  /**
   * Reuse the cluster when it exists, otherwise create it and wait for every node to
   * report Ready.
   */
  async getOrCreate(signal?: AbortSignal): Promise<Result<{ created: boolean }>> {
    const exists = await this.exists();
    if (!exists.ok) {
      return exists;
    }
    if (exists.value) {
      this.logger.info('Using existing kind cluster');
      return Success({ created: false });
    }

    const args = ['create', 'cluster', '--name', this.name];
    if (this.version) {
      args.push('--image', `${IMAGES.KIND_NODE}:${this.version}`);
    }

    this.logger.info({ version: this.version ?? 'default' }, 'Creating kind cluster');
    const created = await runChecked(
      this.runner,
      'kind',
      args,
      `Failed to create kind cluster ${this.name}`,
      signal ? { signal } : undefined,
    );
    if (!created.ok) {
      return created;
    }

    const ready = await this.waitForNodes(signal);
    if (!ready.ok) {
      return ready;
    }

    this.logger.info('kind cluster ready');
    return Success({ created: true });
  }

  /**
   * Export the kubeconfig, switch the current context and verify the API server
   * answers.
   */
  async use(): Promise<Result<void>> {
    const exported = await runChecked(
      this.runner,
      'kind',
      ['export', 'kubeconfig', '--name', this.name],
      'kind export kubeconfig',
    );
    if (!exported.ok) {
      return exported;
    }

    const switched = await runChecked(
      this.runner,
      'kubectl',
      ['config', 'use-context', this.contextName],
      `kubectl config use-context ${this.contextName}`,
    );
    if (!switched.ok) {
      return switched;
    }

    const info = await runChecked(
      this.runner,
      'kubectl',
      ['cluster-info', '--context', this.contextName],
      `Cluster ${this.name} is not reachable`,
    );
    if (!info.ok) {
      return info;
    }

    this.logger.info({ context: this.contextName }, 'Switched to kind cluster');
    return Success(undefined);
  }

  async delete(): Promise<Result<void>> {
    const result = await runChecked(
      this.runner,
      'kind',
      ['delete', 'cluster', '--name', this.name],
      `Failed to delete kind cluster ${this.name}`,
    );
    if (!result.ok) {
      return result;
    }
    this.kubeconfigPath = undefined;
    this.boundKubectl = undefined;
    return Success(undefined);
  }

  /** Load a local image into the cluster nodes */
  async loadImage(image: string): Promise<Result<void>> {
    const result = await runChecked(
      this.runner,
      'kind',
      ['load', 'docker-image', image, '--name', this.name],
      `Failed to load ${image} into kind cluster ${this.name}`,
    );
    return result.ok ? Success(undefined) : result;
  }

  async getKubeconfig(): Promise<Result<string>> {
    const result = await runChecked(
      this.runner,
      'kind',
      ['get', 'kubeconfig', '--name', this.name],
      'kind get kubeconfig',
    );
    return result.ok ? Success(result.value.stdout) : result;
  }

  /**
   * Write the kubeconfig to a temporary file readable only by the current user.
   * The path is cached for the life of the cluster handle.
   */
  async writeKubeconfig(): Promise<Result<string>> {
    if (this.kubeconfigPath) {
      return Success(this.kubeconfigPath);
    }

    const kubeconfig = await this.getKubeconfig();
    if (!kubeconfig.ok) {
      return kubeconfig;
    }

    try {
      const file = tmp.fileSync({ prefix: `kind-${this.name}-kubeconfig-`, mode: 0o600, discardDescriptor: true });
      writeFileSync(file.name, kubeconfig.value, { mode: 0o600 });
      this.kubeconfigPath = file.name;
      this.logger.debug({ path: file.name }, 'Wrote kubeconfig');
      return Success(file.name);
    } catch (error) {
      return Failure(`failed to write kubeconfig to temp file: ${extractErrorMessage(error)}`);
    }
  }

  /**
   * kubectl bound to this cluster's context and kubeconfig.
   */
  async kubectl(): Promise<Result<Kubectl>> {
    if (this.boundKubectl) {
      return Success(this.boundKubectl);
    }

    const path = await this.writeKubeconfig();
    if (!path.ok) {
      return path;
    }

    this.boundKubectl = new Kubectl(this.runner, this.logger, {
      context: this.contextName,
      kubeconfig: path.value,
    });
    return Success(this.boundKubectl);
  }

  private async waitForNodes(signal?: AbortSignal): Promise<Result<void>> {
    const kubectl = new Kubectl(this.runner, this.logger, { context: this.contextName });

    const ready = await pollUntil(
      async () => {
        const nodes = await kubectl.getJson(['get', 'nodes'], nodeListSchema, signal ? { signal } : undefined);
        if (!nodes.ok || nodes.value.items.length === 0) {
          return false;
        }
        return nodes.value.items.every((node) =>
          node.status.conditions.some((condition) => condition.type === 'Ready' && condition.status === 'True'),
        );
      },
      {
        ...this.readiness,
        description: `kind cluster ${this.name}`,
        logger: this.logger,
        ...(signal && { signal }),
        ...(this.sleep && { sleep: this.sleep }),
      },
    );

    return ready.ok ? Success(undefined) : ready;
  }
}
