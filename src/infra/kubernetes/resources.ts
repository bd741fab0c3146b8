/**
 * Accessors for namespaced resources: StatefulSet, Secret, ConfigMap,
 * PersistentVolumeClaim.
 */

import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { Success, Failure, type Result } from '@/types';
import { formatTimeout, type Kubectl } from './kubectl';
import { pvcSchema, type PersistentVolumeClaimObject } from './object';

function parseCount(value: string, field: string): Result<number> {
  if (value === '') {
    return Success(0);
  }
  const count = Number(value);
  if (!Number.isInteger(count)) {
    return Failure(`unexpected ${field}: ${value}`);
  }
  return Success(count);
}

export class StatefulSet {
  constructor(
    private readonly kubectl: Kubectl,
    readonly namespace: string,
    readonly name: string,
  ) {}

  waitReady(): Promise<Result<void>> {
    return this.waitFor(DEFAULT_TIMEOUTS.statefulSetReady);
  }

  /** Wait for the rollout to complete */
  async waitFor(timeoutMs: number): Promise<Result<void>> {
    const result = await this.kubectl.run(
      ['rollout', 'status', 'statefulset', this.name, '-n', this.namespace, `--timeout=${formatTimeout(timeoutMs)}`],
      { timeoutMs: timeoutMs + 5_000 },
    );
    return result.ok ? Success(undefined) : result;
  }

  async readyReplicas(): Promise<Result<number>> {
    return this.jsonpathCount('{.status.readyReplicas}', 'ready replica count');
  }

  async generation(): Promise<Result<number>> {
    return this.jsonpathCount('{.metadata.generation}', 'generation');
  }

  private async jsonpathCount(path: string, field: string): Promise<Result<number>> {
    const output = await this.kubectl.output([
      'get',
      'statefulset',
      this.name,
      '-n',
      this.namespace,
      '-o',
      `jsonpath=${path}`,
    ]);
    return output.ok ? parseCount(output.value, field) : output;
  }
}

export class Secret {
  constructor(
    private readonly kubectl: Kubectl,
    readonly namespace: string,
    readonly name: string,
  ) {}

  /** Decoded value of a data key */
  async get(key: string): Promise<Result<string>> {
    const output = await this.kubectl.output([
      'get',
      'secret',
      this.name,
      '-n',
      this.namespace,
      '-o',
      `jsonpath={.data.${key.replace(/\./g, '\\.')}}`,
    ]);
    if (!output.ok) {
      return output;
    }
    return Success(Buffer.from(output.value, 'base64').toString('utf8'));
  }
}

export class ConfigMap {
  constructor(
    private readonly kubectl: Kubectl,
    readonly namespace: string,
    readonly name: string,
  ) {}

  async get(key: string): Promise<Result<string>> {
    const escaped = key.replace(/\./g, '\\.');
    const result = await this.kubectl.run([
      'get',
      'configmap',
      this.name,
      '-n',
      this.namespace,
      '-o',
      `jsonpath={.data['${escaped}']}`,
    ]);
    return result.ok ? Success(result.value.stdout) : result;
  }
}

export class PersistentVolumeClaim {
  constructor(
    private readonly kubectl: Kubectl,
    readonly namespace: string,
    readonly name: string,
  ) {}

  /** The claim as reported by the cluster; `status.phase` is usually what callers want */
  async get(): Promise<Result<PersistentVolumeClaimObject>> {
    return this.kubectl.getJson(['get', 'pvc', this.name, '-n', this.namespace], pvcSchema);
  }

  async status(): Promise<Result<PersistentVolumeClaimObject['status']>> {
    const claim = await this.get();
    return claim.ok ? Success(claim.value.status) : claim;
  }
}
