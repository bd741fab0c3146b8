/**
 * Helm chart manager
 *
 * Configuration (release, namespace, values, wait, dry run) is collected without any
 * I/O; `install`, `upgrade`, `uninstall` and the queries run helm and return results.
 */

import { writeFileSync } from 'node:fs';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import tmp from 'tmp';
import { z } from 'zod';
import { DEFAULT_TIMEOUTS, KUBERNETES } from '@/config/constants';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { runChecked, type CommandResult, type CommandRunner } from '@/infra/process/runner';
import { Success, Failure, type Result } from '@/types';
import { formatTimeout, type Kubectl } from './kubectl';
import { Namespace } from './namespace';
import type { KubeObject } from './object';
import { Pod } from './pod';
import { ConfigMap, PersistentVolumeClaim, Secret, StatefulSet } from './resources';

export type HelmValues = Record<string, unknown>;

export interface HelmChartConfig {
  chart: string;
  release?: string;
  namespace?: string;
  values: HelmValues;
  wait: boolean;
  timeoutMs?: number;
  dryRun: boolean;
}

export interface HelmChartDeps {
  runner: CommandRunner;
  logger: Logger;
  /** kubectl used for diagnostics and resource accessors */
  kubectl: Kubectl;
  /** Binary name or path, default `helm` */
  binary?: string;
}

const releaseValuesSchema = z.record(z.unknown()).nullable();

function isPlainObject(value: unknown): value is HelmValues {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Assign `value` at a dot-separated path, creating intermediate maps. A non-map value
 * on the way is replaced.
 */
export function setPath(target: HelmValues, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = target;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: HelmValues = {};
      current[part] = created;
      current = created;
    }
  }
  const last = parts[parts.length - 1];
  if (last !== undefined) {
    current[last] = value;
  }
}

/**
 * Read a nested value; `undefined` when any segment is missing.
 */
export function getPath(source: unknown, path: readonly string[]): unknown {
  let current = source;
  for (const part of path) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function cloneValues(values: HelmValues): HelmValues {
  return structuredClone(values);
}

export class HelmChart {
  private readonly config: HelmChartConfig;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly kubectl: Kubectl;
  private readonly binary: string;

  constructor(chart: string, deps: HelmChartDeps) {
    this.config = { chart, values: {}, wait: false, dryRun: false };
    this.runner = deps.runner;
    this.logger = deps.logger.child({ chart });
    this.kubectl = deps.kubectl;
    this.binary = deps.binary ?? 'helm';
  }

  release(name: string): this {
    this.config.release = name;
    return this;
  }

  namespace(namespace: string): this {
    this.config.namespace = namespace;
    return this;
  }

  /** Merge top-level values */
  values(values: HelmValues): this {
    Object.assign(this.config.values, cloneValues(values));
    return this;
  }

  /** Set a nested value with dot notation, e.g. `image.tag` */
  setValue(path: string, value: unknown): this {
    setPath(this.config.values, path, value);
    return this;
  }

  wait(): this {
    this.config.wait = true;
    return this;
  }

  /** Wait for resources, with a timeout */
  waitFor(timeoutMs: number): this {
    this.config.wait = true;
    this.config.timeoutMs = timeoutMs;
    return this;
  }

  dryRun(): this {
    this.config.dryRun = true;
    return this;
  }

  getValues(): HelmValues {
    return cloneValues(this.config.values);
  }

  getConfig(): HelmChartConfig {
    return { ...this.config, values: this.getValues() };
  }

  get releaseName(): string | undefined {
    return this.config.release;
  }

  get namespaceName(): string {
    return this.config.namespace ?? 'default';
  }

  /**
   * Flags shared by install and upgrade. `valuesFile` is the rendered values path.
   */
  buildFlags(valuesFile?: string): string[] {
    const flags: string[] = [];
    if (this.config.namespace) {
      flags.push('--namespace', this.config.namespace);
    }
    if (this.config.wait) {
      flags.push('--wait');
    }
    if (this.config.timeoutMs !== undefined) {
      flags.push('--timeout', formatTimeout(this.config.timeoutMs));
    }
    if (this.config.dryRun) {
      flags.push('--dry-run');
    }
    if (valuesFile) {
      flags.push('--values', valuesFile);
    }
    return flags;
  }

  /** Install the release, creating its namespace */
  install(signal?: AbortSignal): Promise<Result<CommandResult>> {
    return this.deploy('install', ['--create-namespace'], signal);
  }

  upgrade(signal?: AbortSignal): Promise<Result<CommandResult>> {
    return this.deploy('upgrade', [], signal);
  }

  /** Uninstall without waiting for resources to go away */
  async uninstall(): Promise<Result<void>> {
    const release = this.config.release;
    if (!release) {
      return Failure(ERROR_MESSAGES.RELEASE_NAME_REQUIRED);
    }
    const result = await runChecked(
      this.runner,
      this.binary,
      ['uninstall', '--namespace', this.namespaceName, release, '--wait=false'],
      `helm uninstall ${release}`,
    );
    return result.ok ? Success(undefined) : result;
  }

  async status(): Promise<Result<string>> {
    const release = this.config.release;
    if (!release) {
      return Failure(ERROR_MESSAGES.RELEASE_NAME_REQUIRED);
    }
    const result = await runChecked(
      this.runner,
      this.binary,
      ['status', release, '--namespace', this.namespaceName],
      `helm status ${release}`,
    );
    return result.ok ? Success(result.value.stdout) : result;
  }

  /**
   * User-supplied values of the deployed release.
   */
  async getReleaseValues(): Promise<Result<HelmValues>> {
    const release = this.config.release;
    if (!release) {
      return Failure(ERROR_MESSAGES.RELEASE_NAME_REQUIRED);
    }
    const result = await runChecked(
      this.runner,
      this.binary,
      ['get', 'values', release, '--namespace', this.namespaceName, '--output', 'json'],
      `helm get values ${release}`,
    );
    if (!result.ok) {
      return result;
    }

    let body: unknown;
    try {
      body = JSON.parse(result.value.stdout);
    } catch (error) {
      return Failure(`helm get values returned invalid JSON: ${extractErrorMessage(error)}`);
    }
    const parsed = releaseValuesSchema.safeParse(body);
    if (!parsed.success) {
      return Failure(`unexpected helm get values output: ${parsed.error.message}`);
    }
    return Success(parsed.data ?? {});
  }

  /**
   * A deployed value as a string (objects rendered as JSON).
   */
  async getValue(...path: string[]): Promise<Result<string>> {
    const values = await this.getReleaseValues();
    if (!values.ok) {
      return values;
    }
    const value = getPath(values.value, path);
    if (value === undefined) {
      return Failure(`value ${path.join('.')} is not set on release ${this.config.release ?? ''}`);
    }
    return Success(typeof value === 'string' ? value : JSON.stringify(value));
  }

  /**
   * Whether `object` carries this release's helm ownership annotations.
   */
  matches(object: KubeObject): boolean {
    if (!this.config.release) {
      return false;
    }
    const annotations = object.metadata.annotations;
    return (
      annotations[KUBERNETES.HELM_RELEASE_ANNOTATION] === this.config.release &&
      annotations[KUBERNETES.HELM_NAMESPACE_ANNOTATION] === this.namespaceName
    );
  }

  namespaceAccessor(): Namespace {
    return new Namespace(this.kubectl, this.logger, this.namespaceName);
  }

  pod(selector: string): Pod {
    return new Pod(this.kubectl, this.logger, { namespace: this.namespaceName, selector });
  }

  statefulSet(name: string): StatefulSet {
    return new StatefulSet(this.kubectl, this.namespaceName, name);
  }

  secret(name: string): Secret {
    return new Secret(this.kubectl, this.namespaceName, name);
  }

  configMap(name: string): ConfigMap {
    return new ConfigMap(this.kubectl, this.namespaceName, name);
  }

  pvc(name: string): PersistentVolumeClaim {
    return new PersistentVolumeClaim(this.kubectl, this.namespaceName, name);
  }

  private async deploy(
    command: 'install' | 'upgrade',
    extra: readonly string[],
    signal?: AbortSignal,
  ): Promise<Result<CommandResult>> {
    const release = this.config.release;
    if (!release) {
      return Failure(ERROR_MESSAGES.RELEASE_NAME_REQUIRED);
    }

    const valuesFile = this.writeValuesFile();
    if (!valuesFile.ok) {
      return valuesFile;
    }

    try {
      const args = [command, release, this.config.chart, ...extra, ...this.buildFlags(valuesFile.value?.path)];
      this.logger.info({ release, namespace: this.namespaceName }, `helm ${command}`);

      const timeoutMs = (this.config.timeoutMs ?? DEFAULT_TIMEOUTS.helm) + 30_000;
      const result = await runChecked(this.runner, this.binary, args, `helm ${command} ${release} failed`, {
        timeoutMs,
        ...(signal && { signal }),
      });

      if (!result.ok) {
        await this.collectDiagnostics();
      }
      return result;
    } finally {
      valuesFile.value?.remove();
    }
  }

  private writeValuesFile(): Result<{ path: string; remove: () => void } | undefined> {
    if (Object.keys(this.config.values).length === 0) {
      return Success(undefined);
    }
    try {
      const file = tmp.fileSync({ prefix: 'helm-values-', postfix: '.yaml', discardDescriptor: true });
      writeFileSync(file.name, yaml.dump(this.config.values));
      return Success({ path: file.name, remove: () => file.removeCallback() });
    } catch (error) {
      return Failure(`failed to write values file: ${extractErrorMessage(error)}`);
    }
  }

  /**
   * Log release status, pods and recent events. Runs after a failed deploy and never
   * changes its result.
   */
  private async collectDiagnostics(): Promise<void> {
    const release = this.config.release ?? '';
    const namespace = this.namespaceName;

    const sections: Array<[string, () => Promise<CommandResult>]> = [
      ['helm status', () => this.runner.run(this.binary, ['status', release, '-n', namespace])],
      ['pods', () => this.kubectl.exec(['get', 'pods', '-n', namespace, '-o', 'wide'])],
      ['events', () => this.kubectl.exec(['get', 'events', '-n', namespace, '--sort-by=.lastTimestamp'])],
    ];

    for (const [title, collect] of sections) {
      try {
        const result = await collect();
        this.logger.error(
          { release, namespace, command: result.command, exitCode: result.exitCode },
          `${title}:\n${result.stdout || result.stderr}`,
        );
      } catch (error) {
        this.logger.warn({ release, error: extractErrorMessage(error) }, `Collecting ${title} failed`);
      }
    }
  }
}
