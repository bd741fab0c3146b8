/**
 * ActiveMQ Classic broker container
 */

import tmp from 'tmp';
import { z } from 'zod';
import { DEFAULT_NETWORK, DEFAULT_TIMEOUTS, IMAGES, RETRY } from '@/config/constants';
import { findFixture } from '@/lib/fixtures';
import { basicAuth, probeHttp } from '@/lib/http';
import { Success, Failure, type Result } from '@/types';
import { ManagedContainer } from './container';
import { parseContainerSpec, type ContainerSpecInput } from './schema';
import { ServiceContainer, type ServiceContainerOptions } from './service-container';

export const ACTIVEMQ_PORTS = {
  BROKER: 61616,
  WEB_CONSOLE: 8161,
  JMX: 1099,
} as const;

/** Status codes that show the web console is serving requests */
const CONSOLE_UP_STATUSES: ReadonlySet<number> = new Set([200, 302, 401]);

const JVM_OPTIONS = [
  '-Xms256m',
  '-Xmx512m',
  '-XX:+UseG1GC',
  '-XX:MaxGCPauseMillis=200',
  '-Dcom.sun.management.jmxremote',
  `-Dcom.sun.management.jmxremote.port=${ACTIVEMQ_PORTS.JMX}`,
  '-Dcom.sun.management.jmxremote.local.only=false',
  '-Dcom.sun.management.jmxremote.authenticate=false',
  '-Dcom.sun.management.jmxremote.ssl=false',
  '-Djetty.host=0.0.0.0',
].join(' ');

const CONFIG_TARGET = '/opt/apache-activemq/conf/activemq.xml';
const DATA_TARGET = '/opt/apache-activemq/data';

export interface ActiveMQOptions {
  name: string;
  /** Defaults to `admin` */
  username?: string;
  /** Defaults to `admin` */
  password?: string;
  reuse?: boolean;
  image?: string;
  /**
   * Broker configuration mounted read-only. Defaults to `activemq.xml` in the nearest
   * `test/fixtures` directory; `false` keeps the image's configuration.
   */
  configFile?: string | false;
  /** Host directory for broker data; a temporary directory by default */
  dataDir?: string;
  /** Broker name used in management queries */
  brokerName?: string;
}

export interface Credentials {
  username: string;
  password: string;
}

const jolokiaQueuesSchema = z.object({
  status: z.number(),
  value: z.array(z.object({ objectName: z.string() })).default([]),
  error: z.string().optional(),
});

/**
 * Extract `destinationName` from a broker MBean object name.
 */
export function destinationName(objectName: string): string | undefined {
  const match = /(?:^|[:,])destinationName=([^,]+)/.exec(objectName);
  return match?.[1];
}

export class ActiveMQContainer extends ServiceContainer {
  protected override readonly description = 'ActiveMQ';

  private readonly credentials: Credentials;
  private readonly brokerName: string;
  private brokerUrl = '';
  private webConsoleUrl = '';

  constructor(
    container: ManagedContainer,
    credentials: Credentials,
    options: Pick<ServiceContainerOptions, 'readiness' | 'sleep'> & { brokerName?: string } = {},
  ) {
    super(container, options.readiness ?? RETRY.ACTIVEMQ_READINESS, options.sleep);
    this.credentials = credentials;
    this.brokerName = options.brokerName ?? 'localhost';
  }

  /** OpenWire endpoint, `tcp://localhost:<port>` */
  getBrokerUrl(): string {
    return this.brokerUrl;
  }

  /** Web console base URL, `http://localhost:<port>` */
  getWebConsoleUrl(): string {
    return this.webConsoleUrl;
  }

  getJmxPort(): Promise<Result<number>> {
    return this.getPort(ACTIVEMQ_PORTS.JMX);
  }

  getCredentials(): Credentials {
    return { ...this.credentials };
  }

  protected override async resolveEndpoints(): Promise<Result<void>> {
    const broker = await this.getPort(ACTIVEMQ_PORTS.BROKER);
    if (!broker.ok) {
      return Failure(`failed to get ActiveMQ broker port: ${broker.error}`, broker.guidance);
    }
    const webConsole = await this.getPort(ACTIVEMQ_PORTS.WEB_CONSOLE);
    if (!webConsole.ok) {
      return Failure(`failed to get ActiveMQ web console port: ${webConsole.error}`, webConsole.guidance);
    }
    const jmx = await this.getPort(ACTIVEMQ_PORTS.JMX);
    if (!jmx.ok) {
      return Failure(`failed to get ActiveMQ JMX port: ${jmx.error}`, jmx.guidance);
    }

    this.brokerUrl = `tcp://${DEFAULT_NETWORK.host}:${broker.value}`;
    this.webConsoleUrl = `http://${DEFAULT_NETWORK.host}:${webConsole.value}`;

    this.logger.info(
      { brokerUrl: this.brokerUrl, webConsoleUrl: this.webConsoleUrl, jmxPort: jmx.value },
      'ActiveMQ endpoints resolved',
    );
    return Success(undefined);
  }

  /**
   * Unauthenticated GET on the web console. 401 counts as up: the console is listening
   * and enforcing auth.
   */
  protected override async testConnection(): Promise<boolean> {
    if (!this.webConsoleUrl) {
      return false;
    }

    const result = await probeHttp(`${this.webConsoleUrl}/`, {
      timeoutMs: DEFAULT_TIMEOUTS.readinessProbe,
    });
    if (!result.reachable) {
      this.logger.debug({ error: result.error }, 'Web console request failed');
      return false;
    }

    this.logger.debug({ status: result.status }, 'Web console responded');
    return CONSOLE_UP_STATUSES.has(result.status);
  }

  protected override afterReady(): Promise<Result<void>> {
    return this.healthCheck();
  }

  /**
   * Web console check followed by an authenticated queue listing.
   */
  override async healthCheck(): Promise<Result<void>> {
    if (!this.webConsoleUrl) {
      return Failure('web console URL not set - container may not be started');
    }

    const result = await probeHttp(`${this.webConsoleUrl}/`, { timeoutMs: DEFAULT_TIMEOUTS.healthCheck });
    if (!result.reachable) {
      return Failure(`web console request failed: ${result.error}`);
    }
    if (!CONSOLE_UP_STATUSES.has(result.status)) {
      return Failure(`web console returned unexpected status ${result.status}`);
    }

    const queues = await this.listQueues();
    if (!queues.ok) {
      return Failure(`cannot list queues: ${queues.error}`, queues.guidance);
    }
    return Success(undefined);
  }

  /**
   * Queue names reported by the broker's management API.
   */
  async listQueues(): Promise<Result<string[]>> {
    if (!this.webConsoleUrl) {
      return Failure('web console URL not set - container may not be started');
    }

    const mbean = `org.apache.activemq:type=Broker,brokerName=${this.brokerName}/Queues`;
    const url = `${this.webConsoleUrl}/api/jolokia/read/${mbean}`;
    const result = await probeHttp(url, {
      timeoutMs: DEFAULT_TIMEOUTS.healthCheck,
      headers: {
        Authorization: basicAuth(this.credentials.username, this.credentials.password),
        Origin: this.webConsoleUrl,
      },
    });

    if (!result.reachable) {
      return Failure(`queue listing failed: ${result.error}`);
    }
    if (result.status !== 200) {
      return Failure(`queue listing returned status ${result.status}`, {
        details: { status: result.status, body: result.body.slice(0, 512) },
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(result.body);
    } catch {
      return Failure('queue listing returned invalid JSON', { details: { body: result.body.slice(0, 512) } });
    }

    const parsed = jolokiaQueuesSchema.safeParse(body);
    if (!parsed.success) {
      return Failure(`unexpected queue listing response: ${parsed.error.message}`);
    }
    if (parsed.data.status !== 200) {
      return Failure(`queue listing failed: ${parsed.data.error ?? `status ${parsed.data.status}`}`);
    }

    const names = parsed.data.value
      .map((entry) => destinationName(entry.objectName))
      .filter((name): name is string => name !== undefined);
    return Success(names);
  }
}

/**
 * Build the container spec for a broker named `options.name`.
 */
export function activeMQSpec(options: ActiveMQOptions, dataDir: string): ContainerSpecInput {
  const username = options.username || 'admin';
  const password = options.password || 'admin';
  const configFile =
    options.configFile === false ? undefined : (options.configFile ?? findFixture('activemq.xml'));

  return {
    image: options.image ?? IMAGES.ACTIVEMQ,
    name: options.name,
    ports: {
      [ACTIVEMQ_PORTS.BROKER]: 0,
      [ACTIVEMQ_PORTS.WEB_CONSOLE]: 0,
      [ACTIVEMQ_PORTS.JMX]: 0,
    },
    env: [
      `ACTIVEMQ_ADMIN_LOGIN=${username}`,
      `ACTIVEMQ_ADMIN_PASSWORD=${password}`,
      `ACTIVEMQ_OPTS=${JVM_OPTIONS}`,
    ],
    mounts: [
      ...(configFile ? [{ source: configFile, target: CONFIG_TARGET, type: 'bind' as const, readOnly: true }] : []),
      { source: dataDir, target: DATA_TARGET, type: 'bind', readOnly: false },
    ],
    reuse: options.reuse ?? false,
  };
}

/**
 * Validate options and build an ActiveMQ container with a temporary data directory.
 */
export function createActiveMQContainer(
  options: ActiveMQOptions,
  deps: ServiceContainerOptions,
): Result<ActiveMQContainer> {
  const dataDir =
    options.dataDir ?? tmp.dirSync({ prefix: `activemq-data-${options.name}-`, unsafeCleanup: true }).name;

  const spec = parseContainerSpec(activeMQSpec(options, dataDir));
  if (!spec.ok) {
    return spec;
  }

  const container = new ManagedContainer(spec.value, deps);
  const credentials = { username: options.username || 'admin', password: options.password || 'admin' };

  container
    .getLogger()
    .info({ reuse: spec.value.reuse, username: credentials.username, dataDir }, 'Creating ActiveMQ container');

  return Success(
    new ActiveMQContainer(container, credentials, {
      readiness: deps.readiness,
      sleep: deps.sleep,
      brokerName: options.brokerName,
    }),
  );
}
