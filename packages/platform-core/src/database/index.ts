export {
  createDatabaseConnectionFactory,
  DatabaseConnectionFactoryClass,
  type DatabaseConfig,
  type DatabaseHealth,
  type ConnectionWork,
  type DatabaseConnectionFactoryInstance,
  type SQLConnection,
} from './DatabaseConnectionFactory';
