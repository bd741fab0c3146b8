/**
 * Namespace accessor
 */

import type { Logger } from 'pino';
import { Success, type Result } from '@/types';
import type { Kubectl } from './kubectl';
import { podListSchema } from './object';
import { Pod } from './pod';

export class Namespace {
  private readonly kubectl: Kubectl;
  private readonly logger: Logger;
  readonly name: string;

  constructor(kubectl: Kubectl, logger: Logger, name: string) {
    this.kubectl = kubectl;
    this.logger = logger;
    this.name = name;
  }

  /** Create the namespace; an existing one counts as success */
  async create(): Promise<Result<void>> {
    const result = await this.kubectl.run(['create', 'namespace', this.name]);
    if (!result.ok) {
      const stderr = result.guidance?.details?.stderr;
      if (typeof stderr === 'string' && stderr.includes('already exists')) {
        this.logger.debug({ namespace: this.name }, 'Namespace already exists');
        return Success(undefined);
      }
      return result;
    }
    this.logger.debug({ namespace: this.name }, 'Namespace created');
    return Success(undefined);
  }

  /** Request deletion without waiting for finalizers */
  async delete(): Promise<Result<void>> {
    const result = await this.kubectl.run(['delete', 'namespace', this.name, '--wait=false']);
    return result.ok ? Success(undefined) : result;
  }

  /**
   * Pods matching every selector (joined with commas).
   */
  async getPods(...selectors: string[]): Promise<Result<Pod[]>> {
    const args = ['get', 'pods', '-n', this.name];
    const selector = selectors.filter(Boolean).join(',');
    if (selector) {
      args.push('-l', selector);
    }

    const list = await this.kubectl.getJson(args, podListSchema);
    if (!list.ok) {
      return list;
    }

    return Success(
      list.value.items.map(
        (item) =>
          new Pod(this.kubectl, this.logger, {
            namespace: item.metadata.namespace ?? this.name,
            name: item.metadata.name,
            metadata: item.metadata,
          }),
      ),
    );
  }

  pod(selector: string): Pod {
    return new Pod(this.kubectl, this.logger, { namespace: this.name, selector });
  }
}
