/**
 * Generic HTTP service container
 */

import { DEFAULT_NETWORK, DEFAULT_TIMEOUTS, RETRY } from '@/config/constants';
import { probeHttp } from '@/lib/http';
import { Success, Failure, type Result } from '@/types';
import { ManagedContainer } from './container';
import { parseContainerSpec, type ContainerSpecInput } from './schema';
import { ServiceContainer, type ServiceContainerOptions } from './service-container';

export interface HttpServiceOptions {
  /** Any container spec; `port` must be one of its ports */
  spec: ContainerSpecInput;
  port: number;
  /** Request path of the readiness probe, default `/` */
  path?: string;
  /** Statuses that count as ready; any 2xx or 3xx by default */
  acceptStatus?: readonly number[];
  /** Name used in logs and errors, default `HTTP service` */
  description?: string;
}

export class HttpServiceContainer extends ServiceContainer {
  protected override readonly description: string;

  private readonly port: number;
  private readonly path: string;
  private readonly acceptStatus: readonly number[] | undefined;
  private baseUrl = '';

  constructor(
    container: ManagedContainer,
    options: Omit<HttpServiceOptions, 'spec'> & Pick<ServiceContainerOptions, 'readiness' | 'sleep'>,
  ) {
    super(container, options.readiness ?? RETRY.HTTP_READINESS, options.sleep);
    this.description = options.description ?? 'HTTP service';
    this.port = options.port;
    this.path = options.path ?? '/';
    this.acceptStatus = options.acceptStatus;
  }

  /** `http://localhost:<port>`, empty until started */
  getUrl(): string {
    return this.baseUrl;
  }

  private accepts(status: number): boolean {
    return this.acceptStatus ? this.acceptStatus.includes(status) : status >= 200 && status < 400;
  }

  protected override async resolveEndpoints(): Promise<Result<void>> {
    const port = await this.getPort(this.port);
    if (!port.ok) {
      return Failure(`failed to get ${this.description} port: ${port.error}`, port.guidance);
    }
    this.baseUrl = `http://${DEFAULT_NETWORK.host}:${port.value}`;
    return Success(undefined);
  }

  protected override async testConnection(): Promise<boolean> {
    const result = await probeHttp(`${this.baseUrl}${this.path}`, {
      timeoutMs: DEFAULT_TIMEOUTS.readinessProbe,
    });
    return result.reachable && this.accepts(result.status);
  }

  override async healthCheck(): Promise<Result<void>> {
    if (!this.baseUrl) {
      return Failure(`${this.description} URL not set - container may not be started`);
    }
    const result = await probeHttp(`${this.baseUrl}${this.path}`, { timeoutMs: DEFAULT_TIMEOUTS.healthCheck });
    if (!result.reachable) {
      return Failure(`${this.description} request failed: ${result.error}`);
    }
    if (!this.accepts(result.status)) {
      return Failure(`${this.description} returned unexpected status ${result.status}`);
    }
    return Success(undefined);
  }
}

export function createHttpServiceContainer(
  options: HttpServiceOptions,
  deps: ServiceContainerOptions,
): Result<HttpServiceContainer> {
  const spec = parseContainerSpec(options.spec);
  if (!spec.ok) {
    return spec;
  }

  return Success(
    new HttpServiceContainer(new ManagedContainer(spec.value, deps), {
      port: options.port,
      path: options.path,
      acceptStatus: options.acceptStatus,
      description: options.description,
      readiness: deps.readiness,
      sleep: deps.sleep,
    }),
  );
}
