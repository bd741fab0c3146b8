/**
 * Pod accessor
 *
 * A pod is addressed either by name or by label selector; selector-addressed pods
 * resolve to the first match on first use.
 */

import type { Logger } from 'pino';
import { DEFAULT_NETWORK, DEFAULT_TIMEOUTS } from '@/config/constants';
import { pollUntil, type SleepFn } from '@/lib/poll';
import { canConnect, getFreePort } from '@/lib/port-utils';
import type { BackgroundProcess, CommandResult } from '@/infra/process/runner';
import { Success, Failure, type Result } from '@/types';
import { formatTimeout, type Kubectl } from './kubectl';
import { toObjectReference, type ObjectMeta, type ObjectReference } from './object';

export interface PodOptions {
  namespace: string;
  /** Label selector, e.g. `app=api` */
  selector?: string;
  name?: string;
  container?: string;
  /** Metadata already read from the cluster */
  metadata?: ObjectMeta;
  /** Local port allocation for port forwarding */
  allocatePort?: () => Promise<number>;
  sleep?: SleepFn;
}

/**
 * Active `kubectl port-forward`.
 */
export interface PortForward {
  localPort: number;
  process: BackgroundProcess;
  stop(): void;
}

export class Pod {
  private readonly kubectl: Kubectl;
  private readonly logger: Logger;
  private readonly options: PodOptions;
  private resolvedName: string | undefined;

  constructor(kubectl: Kubectl, logger: Logger, options: PodOptions) {
    this.kubectl = kubectl;
    this.logger = logger;
    this.options = options;
    this.resolvedName = options.name ?? options.metadata?.name;
  }

  get namespace(): string {
    return this.options.namespace;
  }

  get selector(): string | undefined {
    return this.options.selector;
  }

  get metadata(): ObjectMeta | undefined {
    return this.options.metadata;
  }

  /**
   * Same pod, commands targeted at `container`.
   */
  withContainer(container: string): Pod {
    const pod = new Pod(this.kubectl, this.logger, { ...this.options, container });
    pod.resolvedName = this.resolvedName;
    return pod;
  }

  /**
   * Pod name, resolving the selector on first call.
   */
  async getName(): Promise<Result<string>> {
    if (this.resolvedName) {
      return Success(this.resolvedName);
    }
    if (!this.options.selector) {
      return Failure('pod has neither a name nor a selector');
    }

    const result = await this.kubectl.output([
      'get',
      'pods',
      '-n',
      this.namespace,
      '-l',
      this.options.selector,
      '-o',
      'jsonpath={.items[0].metadata.name}',
    ]);
    if (!result.ok) {
      return result;
    }
    if (!result.value) {
      return Failure(`no pod found with selector: ${this.options.selector}`, {
        details: { namespace: this.namespace, selector: this.options.selector },
      });
    }

    this.resolvedName = result.value;
    return Success(result.value);
  }

  waitReady(): Promise<Result<void>> {
    return this.waitFor('condition=Ready', DEFAULT_TIMEOUTS.podReady);
  }

  /**
   * `kubectl wait pod` for a condition such as `condition=Ready` or `delete`.
   */
  async waitFor(condition: string, timeoutMs: number): Promise<Result<void>> {
    const args = ['wait', 'pod'];
    if (this.options.selector && !this.options.name) {
      args.push('-n', this.namespace, '-l', this.options.selector);
    } else {
      const name = await this.getName();
      if (!name.ok) {
        return name;
      }
      args.push(name.value, '-n', this.namespace);
    }
    args.push(`--for=${condition}`, `--timeout=${formatTimeout(timeoutMs)}`);

    const result = await this.kubectl.run(args, { timeoutMs: timeoutMs + 5_000 });
    return result.ok ? Success(undefined) : result;
  }

  /**
   * Run a shell command in the pod through `bash -c`.
   */
  async exec(command: string): Promise<Result<CommandResult>> {
    const name = await this.getName();
    if (!name.ok) {
      return name;
    }

    const args = ['exec', '-n', this.namespace, name.value];
    if (this.options.container) {
      args.push('-c', this.options.container);
    }
    args.push('--', 'bash', '-c', command);
    return this.kubectl.run(args);
  }

  async logs(tail?: number): Promise<Result<string>> {
    const name = await this.getName();
    if (!name.ok) {
      return name;
    }

    const args = ['logs', '-n', this.namespace, name.value];
    if (this.options.container) {
      args.push('-c', this.options.container);
    }
    if (tail !== undefined) {
      args.push('--tail', String(tail));
    }

    const result = await this.kubectl.run(args);
    return result.ok ? Success(result.value.stdout) : result;
  }

  /** Pod phase: Pending, Running, Succeeded, Failed or Unknown */
  async status(): Promise<Result<string>> {
    const name = await this.getName();
    if (!name.ok) {
      return name;
    }
    return this.kubectl.output(['get', 'pod', name.value, '-n', this.namespace, '-o', 'jsonpath={.status.phase}']);
  }

  /**
   * First owner reference of the pod (ReplicaSet, StatefulSet, Job, ...).
   */
  owner(): Result<ObjectReference> {
    const owner = this.options.metadata?.ownerReferences[0];
    if (!owner) {
      return Failure('no owner references found');
    }
    return Success(toObjectReference(owner));
  }

  /**
   * Forward a free local port to `port` on the pod and wait until it accepts
   * connections.
   */
  async forwardPort(port: number, signal?: AbortSignal): Promise<Result<PortForward>> {
    const name = await this.getName();
    if (!name.ok) {
      return name;
    }

    const localPort = await (this.options.allocatePort ?? getFreePort)();
    this.logger.info({ pod: name.value, port, localPort }, 'Forwarding pod port');

    const forward = this.kubectl.spawn(
      ['port-forward', '-n', this.namespace, name.value, `${localPort}:${port}`],
      signal ? { signal } : undefined,
    );

    const ready = await pollUntil(() => canConnect(localPort, DEFAULT_NETWORK.loopback), {
      attempts: Math.ceil(DEFAULT_TIMEOUTS.portForward / DEFAULT_TIMEOUTS.portForwardPoll),
      intervalMs: DEFAULT_TIMEOUTS.portForwardPoll,
      description: `port-forward ${name.value}:${port}`,
      logger: this.logger,
      ...(signal && { signal }),
      ...(this.options.sleep && { sleep: this.options.sleep }),
    });

    if (!ready.ok) {
      forward.stop();
      this.logger.error({ pod: name.value, output: forward.output() }, 'Timed out waiting for port forward');
      return Failure(`port forward to ${name.value}:${port} did not become ready: ${ready.error}`, ready.guidance);
    }

    return Success({ localPort, process: forward, stop: () => forward.stop() });
  }
}
