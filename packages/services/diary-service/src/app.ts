/**
 * Diary Service HTTP application
 * Builds the express app around already-constructed services so tests can
 * drive it with in-memory stand-ins.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { DatabaseHealth } from '@diary/platform-core';
import { errorHandler, notFoundHandler, requestLogger } from '@diary/platform-core';
import type { DiaryService } from './application/services/DiaryService';
import type { ImageService } from './application/services/ImageService';
import { DiaryController } from './presentation/controllers/DiaryController';
import { createDiaryRoutes } from './presentation/routes/diaryRoutes';
import { SERVICE_NAME } from './config/service-config';

export const API_BASE_PATH = '/api/diary';

export interface DiaryAppDeps {
  diaryService: DiaryService;
  imageService: ImageService;
  checkDatabase: () => Promise<DatabaseHealth>;
  corsOrigin?: string | string[];
}

export function createApp(deps: DiaryAppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger(SERVICE_NAME));

  const controller = new DiaryController({
    diaryService: deps.diaryService,
    imageService: deps.imageService,
    checkDatabase: deps.checkDatabase,
  });

  app.get('/health', controller.healthCheck);
  app.use(API_BASE_PATH, createDiaryRoutes(controller));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
