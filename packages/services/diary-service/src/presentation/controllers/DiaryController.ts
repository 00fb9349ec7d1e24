/**
 * Diary Controller
 * HTTP endpoints for entries and their images
 */

import type { Request, Response } from 'express';
import type { DatabaseHealth } from '@diary/platform-core';
import { isShutdownInProgress, serializeError } from '@diary/platform-core';
import type { CreateEntryRequest, ServiceHealth, UpdateEntryRequest } from '@diary/shared-contracts';
import type { DiaryService } from '../../application/services/DiaryService';
import type { ImageService } from '../../application/services/ImageService';
import { parseListEntriesQuery } from '../../application/services/list-options';
import { DiaryError, DiaryErrorCode } from '../../application/errors';
import { SERVICE_NAME, getLogger } from '../../config/service-config';
import { sendSuccess, sendCreated, ServiceErrors } from '../utils/response-helpers';

const logger = getLogger('diary-controller');

export interface DiaryControllerDeps {
  diaryService: DiaryService;
  imageService: ImageService;
  checkDatabase: () => Promise<DatabaseHealth>;
}

// Path params have already passed the positive-integer schema
function idParam(req: Request, name: string): number {
  return Number(req.params[name]);
}

export class DiaryController {
  private readonly diaryService: DiaryService;
  private readonly imageService: ImageService;
  private readonly checkDatabase: () => Promise<DatabaseHealth>;

  constructor(deps: DiaryControllerDeps) {
    this.diaryService = deps.diaryService;
    this.imageService = deps.imageService;
    this.checkDatabase = deps.checkDatabase;
  }

  createEntry = async (req: Request, res: Response): Promise<void> => {
    try {
      const body: CreateEntryRequest = req.body;
      const entry = await this.diaryService.createEntry(body.title, body.description, body.date);
      sendCreated(res, entry, 'Entry created successfully');
    } catch (error) {
      this.handleError(res, error, req, 'create entry');
    }
  };

  listEntries = async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await this.diaryService.getEntries(parseListEntriesQuery(req.query));
      sendSuccess(res, result, 'Entries retrieved successfully');
    } catch (error) {
      this.handleError(res, error, req, 'list entries');
    }
  };

  listEntriesByDate = async (req: Request, res: Response): Promise<void> => {
    try {
      const day = req.params.date;
      const entries = await this.diaryService.getEntriesByDate(new Date(`${day}T00:00:00.000Z`));
      sendSuccess(res, entries, `Entries for ${day} retrieved successfully`);
    } catch (error) {
      this.handleError(res, error, req, 'list entries by date');
    }
  };

  getEntry = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = idParam(req, 'id');
      const entry = await this.diaryService.getEntryById(id);
      if (!entry) {
        ServiceErrors.notFound(res, `Entry with ID ${id}`, req, DiaryErrorCode.ENTRY_NOT_FOUND);
        return;
      }
      sendSuccess(res, entry, 'Entry retrieved successfully');
    } catch (error) {
      this.handleError(res, error, req, 'get entry');
    }
  };

  updateEntry = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = idParam(req, 'id');
      const body: UpdateEntryRequest = req.body;
      const entry = await this.diaryService.updateEntry(id, body);
      if (!entry) {
        ServiceErrors.notFound(res, `Entry with ID ${id}`, req, DiaryErrorCode.ENTRY_NOT_FOUND);
        return;
      }
      sendSuccess(res, entry, 'Entry updated successfully');
    } catch (error) {
      this.handleError(res, error, req, 'update entry');
    }
  };

  deleteEntry = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = idParam(req, 'id');
      const deleted = await this.diaryService.deleteEntry(id);
      if (!deleted) {
        ServiceErrors.notFound(res, `Entry with ID ${id}`, req, DiaryErrorCode.ENTRY_NOT_FOUND);
        return;
      }
      sendSuccess(res, true, 'Entry deleted successfully');
    } catch (error) {
      this.handleError(res, error, req, 'delete entry');
    }
  };

  uploadImage = async (req: Request, res: Response): Promise<void> => {
    try {
      const entryId = idParam(req, 'entryId');
      const image = await this.imageService.uploadImage(entryId, req.file?.buffer, req.file?.originalname ?? '');
      sendCreated(res, image, 'Image uploaded successfully');
    } catch (error) {
      this.handleError(res, error, req, 'upload image');
    }
  };

  getImage = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = idParam(req, 'id');
      const image = await this.imageService.getImage(id);
      if (!image) {
        ServiceErrors.notFound(res, `Image with ID ${id}`, req, DiaryErrorCode.IMAGE_NOT_FOUND);
        return;
      }
      res.setHeader('Content-Type', image.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="image_${image.imageId}${image.extension}"`);
      res.status(200).send(image.data);
    } catch (error) {
      this.handleError(res, error, req, 'get image');
    }
  };

  deleteImage = async (req: Request, res: Response): Promise<void> => {
    try {
      const id = idParam(req, 'id');
      const deleted = await this.imageService.deleteImage(id);
      if (!deleted) {
        ServiceErrors.notFound(res, `Image with ID ${id}`, req, DiaryErrorCode.IMAGE_NOT_FOUND);
        return;
      }
      sendSuccess(res, true, 'Image deleted successfully');
    } catch (error) {
      this.handleError(res, error, req, 'delete image');
    }
  };

  healthCheck = async (_req: Request, res: Response): Promise<void> => {
    const database = await this.checkDatabase();
    const shuttingDown = isShutdownInProgress();
    const healthy = database.healthy && !shuttingDown;

    const health: ServiceHealth = {
      status: healthy ? 'healthy' : 'unhealthy',
      service: SERVICE_NAME,
      uptime: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
      dependencies: {
        database: {
          status: database.healthy ? 'healthy' : 'unhealthy',
          latencyMs: database.latencyMs,
          ...(database.error && { error: database.error }),
        },
      },
    };
    sendSuccess(res, health, shuttingDown ? 'Service is shutting down' : 'Health check completed', healthy ? 200 : 503);
  };

  private handleError(res: Response, error: unknown, req: Request, operation: string): void {
    if (error instanceof DiaryError && error.isClientError) {
      logger.warn(`Failed to ${operation}`, { code: error.code, message: error.message });
    } else {
      logger.error(`Failed to ${operation}`, { error: serializeError(error) });
    }
    ServiceErrors.fromException(res, error, req);
  }
}
