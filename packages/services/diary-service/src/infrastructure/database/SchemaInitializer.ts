import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { SQLConnection } from './DatabaseConnectionFactory';
import { getLogger } from '../../config/service-config';

const logger = getLogger('diary-service-schema');

export const INIT_SQL_PATH = fileURLToPath(new URL('../../schema/init.sql', import.meta.url));

/**
 * Creates the diary tables and indexes when missing. Every statement in
 * init.sql is `IF NOT EXISTS`, so this runs on each startup.
 */
export async function initializeSchema(
  connection: Pick<SQLConnection, 'query'>,
  sqlPath: string = INIT_SQL_PATH
): Promise<void> {
  const ddl = await readFile(sqlPath, 'utf8');
  await connection.query(ddl);
  logger.info('Diary schema ready', { sqlPath });
}
