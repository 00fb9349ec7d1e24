/**
 * Diary Service
 * Bootstrap and startup logic
 */

// Must stay the first import: ES imports are evaluated before this module's body
import './load-env';
import {
  createLogger,
  registerGlobalErrorHandlers,
  serializeError,
  setupGracefulShutdown,
} from '@diary/platform-core';
import { SERVICE_NAME, loadDiaryConfig } from './config/service-config';
import { createDiaryDatabase, initializeSchema } from './infrastructure/database';
import { LocalBlobStore } from './infrastructure/providers';
import { DiaryService, ImageService } from './application/services';
import { createApp } from './app';

const logger = createLogger(SERVICE_NAME);

async function start(): Promise<void> {
  registerGlobalErrorHandlers();

  const serviceConfig = loadDiaryConfig();

  const database = createDiaryDatabase({
    connectionString: serviceConfig.databaseUrl,
    poolMax: serviceConfig.databasePoolMax,
  });
  await initializeSchema(database.getSQLConnection());

  const blobStore = new LocalBlobStore(serviceConfig.uploadsDir);
  await blobStore.ensureReady();

  const app = createApp({
    diaryService: new DiaryService(database.withScope, blobStore),
    imageService: new ImageService(database.withScope, blobStore),
    checkDatabase: database.healthCheck,
    corsOrigin: serviceConfig.corsOrigin,
  });

  const server = app.listen(serviceConfig.port, () => {
    logger.info('Diary service started', {
      port: serviceConfig.port,
      uploadsDir: serviceConfig.uploadsDir,
    });
  });

  setupGracefulShutdown(server, serviceConfig.shutdownTimeoutMs);
}

start().catch(error => {
  logger.error('Failed to start diary service', { error: serializeError(error) });
  process.exit(1);
});
