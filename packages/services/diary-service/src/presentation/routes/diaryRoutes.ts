/**
 * Diary Routes
 * HTTP route definitions mounted under /api/diary
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import {
  EntryDateParamsSchema,
  EntryIdParamsSchema,
  EntryImagesParamsSchema,
  ImageIdParamsSchema,
  CreateEntryRequestSchema,
  UpdateEntryRequestSchema,
} from '@diary/shared-contracts';
import { createValidation, getConfig, serializeError } from '@diary/platform-core';
import type { DiaryController } from '../controllers/DiaryController';
import { MAX_IMAGE_BYTES, maxImageMegabytes } from '../../application/services/image-rules';
import { DiaryError } from '../../application/errors';
import { SERVICE_NAME, getLogger } from '../../config/service-config';
import { ServiceErrors } from '../utils/response-helpers';

const logger = getLogger('diary-routes');

const { validateBody, validateParams } = createValidation(SERVICE_NAME);

const MULTIPART_ERROR_MESSAGES: Record<string, string> = {
  LIMIT_UNEXPECTED_FILE: 'Image must be sent in the "image" field',
  LIMIT_FILE_COUNT: 'Only one image can be uploaded per request',
  LIMIT_PART_COUNT: 'Upload has too many parts',
  LIMIT_FIELD_KEY: 'Upload field name is too long',
  LIMIT_FIELD_VALUE: 'Upload field value is too long',
  LIMIT_FIELD_COUNT: 'Upload has too many fields',
  MISSING_FIELD_NAME: 'Upload field name is missing',
};

// The service enforces the same ceiling; multer stops buffering past it
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_IMAGE_BYTES,
    files: 1,
  },
});

export function createDiaryRoutes(controller: DiaryController): Router {
  const router = Router();

  const uploadLimit = rateLimit({
    windowMs: getConfig('UPLOAD_RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
    limit: getConfig('UPLOAD_RATE_LIMIT_MAX', 60),
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: {
      success: false,
      message: 'Too many upload requests, please try again later',
      error: {
        type: 'ValidationError',
        code: 'RATE_LIMIT_EXCEEDED',
        message: 'Too many upload requests, please try again later',
      },
    },
  });

  router.get('/health', controller.healthCheck);

  // Entries
  router.post('/entries', validateBody(CreateEntryRequestSchema), controller.createEntry);
  router.get('/entries', controller.listEntries);
  router.get('/entries/by-date/:date', validateParams(EntryDateParamsSchema), controller.listEntriesByDate);
  router.get('/entries/:id', validateParams(EntryIdParamsSchema), controller.getEntry);
  router.put(
    '/entries/:id',
    validateParams(EntryIdParamsSchema),
    validateBody(UpdateEntryRequestSchema),
    controller.updateEntry
  );
  router.delete('/entries/:id', validateParams(EntryIdParamsSchema), controller.deleteEntry);

  // Images
  router.post(
    '/entries/:entryId/images',
    uploadLimit,
    validateParams(EntryImagesParamsSchema),
    upload.single('image'),
    controller.uploadImage
  );
  router.get('/images/:id', validateParams(ImageIdParamsSchema), controller.getImage);
  router.delete('/images/:id', validateParams(ImageIdParamsSchema), controller.deleteImage);

  // Upload errors raised by multer before the controller runs
  router.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      if (error.code === 'LIMIT_FILE_SIZE') {
        ServiceErrors.fromException(res, DiaryError.fileTooLarge(maxImageMegabytes()), req);
        return;
      }
      logger.warn('Rejected multipart upload', { code: error.code, field: error.field });
      const message = MULTIPART_ERROR_MESSAGES[error.code] ?? 'Invalid multipart upload';
      ServiceErrors.badRequest(res, message, req, { code: error.code });
      return;
    }

    logger.error('Unexpected error in diary routes', { error: serializeError(error) });
    next(error);
  });

  return router;
}
