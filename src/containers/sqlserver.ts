/**
 * SQL Server (Azure SQL Edge) container
 */

import { ConnectionPool, type config as SqlConfig } from 'mssql';
import { DEFAULT_NETWORK, DEFAULT_TIMEOUTS, IMAGES, RETRY } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { Success, Failure, type Result } from '@/types';
import { ManagedContainer } from './container';
import { parseContainerSpec, type ContainerSpecInput } from './schema';
import { ServiceContainer, type ServiceContainerOptions } from './service-container';

export const SQLSERVER_PORT = 1433;

const SA_USER = 'sa';
const DEFAULT_DATABASE = 'master';

export interface SqlServerOptions {
  name: string;
  /** SA password; must satisfy the server's complexity policy */
  password: string;
  reuse?: boolean;
  image?: string;
  /** Encrypt the connection. Off by default: test containers use a self-signed cert */
  encrypt?: boolean;
  /** Defaults to `!encrypt` */
  trustServerCertificate?: boolean;
}

export interface SqlServerConnection {
  encrypt: boolean;
  trustServerCertificate: boolean;
}

export class SqlServerContainer extends ServiceContainer {
  protected override readonly description = 'SQL Server';

  private readonly password: string;
  private readonly connection: SqlServerConnection;
  private hostPort = 0;

  constructor(
    container: ManagedContainer,
    password: string,
    connection: SqlServerConnection,
    options: Pick<ServiceContainerOptions, 'readiness' | 'sleep'> = {},
  ) {
    super(container, options.readiness ?? RETRY.SQLSERVER_READINESS, options.sleep);
    this.password = password;
    this.connection = connection;
  }

  /**
   * Driver configuration for the `mssql` package. Empty host port before start.
   */
  getConnectionConfig(): SqlConfig {
    return {
      server: DEFAULT_NETWORK.host,
      port: this.hostPort,
      database: DEFAULT_DATABASE,
      user: SA_USER,
      password: this.password,
      connectionTimeout: DEFAULT_TIMEOUTS.sqlConnect,
      requestTimeout: DEFAULT_TIMEOUTS.sqlConnect,
      options: {
        encrypt: this.connection.encrypt,
        trustServerCertificate: this.connection.trustServerCertificate,
      },
    };
  }

  /**
   * ADO.NET-style connection string. Empty until the container has started.
   */
  getConnectionString(): string {
    if (!this.hostPort) {
      return '';
    }
    return [
      `Server=${DEFAULT_NETWORK.host},${this.hostPort}`,
      `Database=${DEFAULT_DATABASE}`,
      `User Id=${SA_USER}`,
      `Password=${this.password}`,
      `Encrypt=${this.connection.encrypt}`,
      `TrustServerCertificate=${this.connection.trustServerCertificate}`,
    ].join(';');
  }

  protected override async resolveEndpoints(): Promise<Result<void>> {
    const port = await this.getPort(SQLSERVER_PORT);
    if (!port.ok) {
      return Failure(`failed to get SQL Server port: ${port.error}`, port.guidance);
    }
    this.hostPort = port.value;
    this.logger.info({ port: this.hostPort }, 'SQL Server endpoint resolved');
    return Success(undefined);
  }

  protected override async testConnection(): Promise<boolean> {
    const result = await this.selectOne();
    if (!result.ok) {
      this.logger.debug({ error: result.error }, 'SQL Server not ready');
    }
    return result.ok;
  }

  /**
   * Connect and verify `SELECT 1` returns 1.
   */
  override async healthCheck(): Promise<Result<void>> {
    if (!this.hostPort) {
      return Failure('connection string not set - container may not be started');
    }
    const result = await this.selectOne();
    return result.ok ? Success(undefined) : Failure(`health check failed - ${result.error}`);
  }

  /** Each call opens and closes its own connection */
  private async selectOne(): Promise<Result<void>> {
    if (!this.hostPort) {
      return Failure('SQL Server port not resolved');
    }

    const pool = new ConnectionPool(this.getConnectionConfig());
    try {
      await pool.connect();
      const result = await pool.request().query<{ value: number }>('SELECT 1 AS value');
      const value = result.recordset[0]?.value;
      if (value !== 1) {
        return Failure(`unexpected query result: ${String(value)}`);
      }
      return Success(undefined);
    } catch (error) {
      return Failure(`query failed: ${extractErrorMessage(error)}`);
    } finally {
      await pool.close().catch((error: unknown) => {
        this.logger.debug({ error: extractErrorMessage(error) }, 'Closing SQL connection failed');
      });
    }
  }
}

export function sqlServerSpec(options: SqlServerOptions): ContainerSpecInput {
  return {
    image: options.image ?? IMAGES.SQLSERVER,
    name: options.name,
    ports: { [SQLSERVER_PORT]: 0 },
    env: ['ACCEPT_EULA=Y', `SA_PASSWORD=${options.password}`, 'MSSQL_PID=Developer'],
    reuse: options.reuse ?? false,
  };
}

export function createSqlServerContainer(
  options: SqlServerOptions,
  deps: ServiceContainerOptions,
): Result<SqlServerContainer> {
  if (!options.password) {
    return Failure('SQL Server requires an SA password');
  }

  const spec = parseContainerSpec(sqlServerSpec(options));
  if (!spec.ok) {
    return spec;
  }

  const encrypt = options.encrypt ?? false;
  const connection = {
    encrypt,
    trustServerCertificate: options.trustServerCertificate ?? !encrypt,
  };

  return Success(
    new SqlServerContainer(new ManagedContainer(spec.value, deps), options.password, connection, {
      readiness: deps.readiness,
      sleep: deps.sleep,
    }),
  );
}
