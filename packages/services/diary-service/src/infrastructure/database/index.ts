export {
  createDiaryDatabase,
  type DiaryDatabase,
  type DiaryDatabaseOptions,
  type DatabaseConnection,
  type DatabaseSchema,
  type SQLConnection,
} from './DatabaseConnectionFactory';
export { initializeSchema, INIT_SQL_PATH } from './SchemaInitializer';
