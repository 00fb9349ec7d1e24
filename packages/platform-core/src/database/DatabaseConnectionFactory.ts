/**
 * Centralized Database Connection Factory
 *
 * Provides consistent database connection management across services.
 * Each service creates its own factory instance with service-specific configuration.
 *
 * @example
 * import { createDatabaseConnectionFactory } from '@diary/platform-core';
 * import * as schema from './schema/diary-schema';
 *
 * const { withConnection } = createDatabaseConnectionFactory({
 *   serviceName: 'diary-service',
 *   envVarName: 'DIARY_DATABASE_URL',
 *   schema,
 * });
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import { getConfig } from '../config/environment-config';
import { DomainError } from '../error-handling/errors';
import { registerPhasedShutdownHook } from '../lifecycle/gracefulShutdown';

export type SQLConnection = Pool;

export interface DatabaseConfig<TSchema extends Record<string, unknown> = Record<string, unknown>> {
  serviceName: string;
  envVarName?: string;
  fallbackEnvVar?: string;
  /** Takes precedence over the environment variables */
  connectionString?: string;
  poolMax?: number;
  schema?: TSchema;
}

export interface DatabaseHealth {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

export type ConnectionWork<TSchema extends Record<string, unknown>, T> = (db: NodePgDatabase<TSchema>) => Promise<T>;

export interface DatabaseConnectionFactoryInstance<TSchema extends Record<string, unknown>> {
  getInstance: () => DatabaseConnectionFactoryClass<TSchema>;
  getSQLConnection: () => SQLConnection;
  withConnection: <T>(work: ConnectionWork<TSchema, T>) => Promise<T>;
  healthCheck: () => Promise<DatabaseHealth>;
  close: () => Promise<void>;
}

class DatabaseConnectionFactoryClass<TSchema extends Record<string, unknown>> {
  private sqlConnection: SQLConnection | null = null;
  private isClosed = false;
  private readonly config: DatabaseConfig<TSchema> & { envVarName: string; fallbackEnvVar: string };
  private readonly logger;

  constructor(config: DatabaseConfig<TSchema>) {
    this.config = {
      ...config,
      envVarName: config.envVarName || 'DATABASE_URL',
      fallbackEnvVar: config.fallbackEnvVar || 'DATABASE_URL',
    };
    this.logger = getLogger(`${config.serviceName}-database`);
  }

  private getConnectionString(): string {
    const { envVarName, fallbackEnvVar, serviceName } = this.config;
    const connectionString = this.config.connectionString || process.env[envVarName] || process.env[fallbackEnvVar];

    if (!connectionString) {
      this.logger.error('Database URL not configured', {
        serviceName,
        requiredEnvVar: `${envVarName} or ${fallbackEnvVar}`,
      });
      throw new DomainError(`${envVarName} or ${fallbackEnvVar} environment variable is required for ${serviceName}`);
    }

    return this.appendConnectionParams(connectionString);
  }

  private getSslConfig(connStr: string): false | { rejectUnauthorized: boolean } {
    if (!getConfig('DATABASE_SSL', true)) {
      return false;
    }
    try {
      const url = new URL(connStr);
      const host = url.hostname;
      if (host === 'localhost' || host === '127.0.0.1' || url.searchParams.get('sslmode') === 'disable') {
        return false;
      }
    } catch (error) {
      this.logger.warn('Connection string is not a URL, using SSL defaults', { error: serializeError(error) });
    }
    return { rejectUnauthorized: false };
  }

  private appendConnectionParams(connStr: string): string {
    const statementTimeout = getConfig('STATEMENT_TIMEOUT_MS', 30000);
    if (!connStr.includes('statement_timeout=')) {
      connStr += connStr.includes('?')
        ? `&statement_timeout=${statementTimeout}`
        : `?statement_timeout=${statementTimeout}`;
    }
    return connStr;
  }

  private createPool(connStr: string): Pool {
    const maxConnections =
      this.config.poolMax ?? getConfig('DATABASE_POOL_MAX', process.env.NODE_ENV === 'production' ? 20 : 5);
    const pool = new Pool({
      connectionString: connStr,
      max: maxConnections,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      ssl: this.getSslConfig(connStr),
    });
    // Idle clients can error when the server drops them; the pool replaces them
    pool.on('error', error => {
      this.logger.error('Idle database client error', { error: serializeError(error) });
    });
    return pool;
  }

  public getSQLConnection(): SQLConnection {
    if (this.isClosed) {
      throw new DomainError(`Database connections for ${this.config.serviceName} are closed`, 503);
    }
    if (!this.sqlConnection) {
      try {
        this.sqlConnection = this.createPool(this.getConnectionString());
        this.logger.debug('SQL connection pool established', { serviceName: this.config.serviceName });
      } catch (error: unknown) {
        this.logger.error('SQL connection failed', {
          serviceName: this.config.serviceName,
          error: serializeError(error),
        });
        throw error;
      }
    }
    return this.sqlConnection;
  }

  /**
   * Checks one client out of the pool for the duration of `work` and always
   * returns it. A client whose work failed below the domain layer is handed
   * back with the error so the pool destroys it instead of reusing it.
   */
  public async withConnection<T>(work: ConnectionWork<TSchema, T>): Promise<T> {
    const client = await this.getSQLConnection().connect();
    let failure: Error | undefined;

    try {
      return await work(drizzle(client, { schema: this.config.schema }));
    } catch (error) {
      if (!(error instanceof DomainError)) {
        failure = error instanceof Error ? error : new Error(String(error));
      }
      throw error;
    } finally {
      client.release(failure);
    }
  }

  public async healthCheck(): Promise<DatabaseHealth> {
    const startedAt = Date.now();
    try {
      await this.getSQLConnection().query('SELECT 1');
      return { healthy: true, latencyMs: Date.now() - startedAt };
    } catch (error) {
      this.logger.warn('Database health check failed', { error: serializeError(error) });
      return {
        healthy: false,
        latencyMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  public async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.logger.info('Closing database connections', { serviceName: this.config.serviceName });
    if (this.sqlConnection) await this.sqlConnection.end();
    this.sqlConnection = null;
    this.logger.info('Database connection pool closed', { serviceName: this.config.serviceName });
  }
}

export function createDatabaseConnectionFactory<TSchema extends Record<string, unknown> = Record<string, unknown>>(
  config: DatabaseConfig<TSchema>
): DatabaseConnectionFactoryInstance<TSchema> {
  let instance: DatabaseConnectionFactoryClass<TSchema> | null = null;

  const getInstance = (): DatabaseConnectionFactoryClass<TSchema> => {
    if (!instance) {
      instance = new DatabaseConnectionFactoryClass(config);
    }
    return instance;
  };

  const closeFactory = async () => {
    if (instance) {
      await instance.close();
      instance = null;
    }
  };

  registerPhasedShutdownHook('connections', closeFactory, `database:${config.serviceName}`);

  return {
    getInstance,
    getSQLConnection: () => getInstance().getSQLConnection(),
    withConnection: work => getInstance().withConnection(work),
    healthCheck: () => getInstance().healthCheck(),
    close: closeFactory,
  };
}

export { DatabaseConnectionFactoryClass };
