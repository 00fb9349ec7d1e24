/**
 * Diary Service Database Connection Factory
 *
 * Uses the DatabaseConnectionFactory from platform-core with diary-service
 * specific configuration, and binds its scoped connections to the repositories.
 */

import { createDatabaseConnectionFactory, type DatabaseHealth, type SQLConnection } from '@diary/platform-core';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../../schema/diary-schema';
import type { ConnectionScope } from '../../application/interfaces';
import { DrizzleEntryRepository, DrizzleImageRepository } from '../repositories';

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = NodePgDatabase<DatabaseSchema>;
export type { SQLConnection };

export interface DiaryDatabaseOptions {
  connectionString?: string;
  poolMax?: number;
}

export interface DiaryDatabase {
  withScope: ConnectionScope;
  getSQLConnection: () => SQLConnection;
  healthCheck: () => Promise<DatabaseHealth>;
  close: () => Promise<void>;
}

export function createDiaryDatabase(options: DiaryDatabaseOptions = {}): DiaryDatabase {
  const factory = createDatabaseConnectionFactory({
    serviceName: 'diary-service',
    envVarName: 'DIARY_DATABASE_URL',
    fallbackEnvVar: 'DATABASE_URL',
    connectionString: options.connectionString,
    poolMax: options.poolMax,
    schema,
  });

  const withScope: ConnectionScope = work =>
    factory.withConnection(db =>
      work({
        entries: new DrizzleEntryRepository(db),
        images: new DrizzleImageRepository(db),
      })
    );

  return {
    withScope,
    getSQLConnection: factory.getSQLConnection,
    healthCheck: factory.healthCheck,
    close: factory.close,
  };
}
