/**
 * Shared Response Helpers
 *
 * Factory functions to create service-specific response helpers that emit the
 * ServiceResponse<T> envelope from @diary/shared-contracts.
 *
 * Usage:
 *   import { createResponseHelpers } from '@diary/platform-core';
 *   const { sendSuccess, sendCreated, ServiceErrors } = createResponseHelpers('diary-service');
 */

import type { Response } from 'express';
import { StructuredErrors, getCorrelationId, type ErrorCode, type ServiceResponse } from '@diary/shared-contracts';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, req?: RequestWithHeaders) => void;

  notFound: (res: Response, resource: string, req?: RequestWithHeaders, code?: ErrorCode) => void;

  badRequest: (res: Response, message: string, req?: RequestWithHeaders, details?: Record<string, unknown>) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, message: string, statusCode?: number) => void;
  sendCreated: <T>(res: Response, data: T, message: string) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const correlationOf = (req?: RequestWithHeaders) => (req ? getCorrelationId(req) : undefined);

  return {
    fromException: (res, error, req) => {
      StructuredErrors.fromException(res, error, { service: serviceName, correlationId: correlationOf(req) });
    },

    notFound: (res, resource, req, code) => {
      StructuredErrors.notFound(res, resource, { service: serviceName, correlationId: correlationOf(req), code });
    },

    badRequest: (res, message, req, details) => {
      StructuredErrors.validation(res, message, {
        service: serviceName,
        correlationId: correlationOf(req),
        details,
      });
    },
  };
}

function sendSuccess<T>(res: Response, data: T, message: string, statusCode = 200): void {
  const body: ServiceResponse<T> = {
    success: true,
    message,
    data,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(body);
}

function sendCreated<T>(res: Response, data: T, message: string): void {
  sendSuccess(res, data, message, 201);
}

/**
 * Create response helpers for a specific service
 *
 * @example
 * ```typescript
 * const { sendSuccess, ServiceErrors } = createResponseHelpers('diary-service');
 *
 * const entry = await diaryService.getEntryById(id);
 * if (!entry) {
 *   ServiceErrors.notFound(res, `Entry with ID ${id}`, req);
 *   return;
 * }
 * sendSuccess(res, entry, 'Entry retrieved successfully');
 * ```
 */
export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess,
    sendCreated,
    ServiceErrors: createServiceErrors(serviceName),
  };
}
