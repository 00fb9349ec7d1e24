import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { StructuredErrors, getCorrelationId } from '@diary/shared-contracts';

// The first issue becomes the envelope message; every issue is listed in details
function handleZodError(res: Response, req: Request, error: z.ZodError, serviceName: string, fallback: string): void {
  StructuredErrors.validation(res, error.errors[0]?.message ?? fallback, {
    service: serviceName,
    correlationId: getCorrelationId(req),
    details: {
      errors: error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    },
  });
}

export function createValidateBody(serviceName: string) {
  return function validateBody<T>(schema: z.ZodSchema<T>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.body ?? {});
      if (!result.success) {
        handleZodError(res, req, result.error, serviceName, 'Request body validation failed');
        return;
      }
      req.body = result.data;
      next();
    };
  };
}

export function createValidateParams(serviceName: string) {
  return function validateParams<T extends Record<string, string>>(schema: z.ZodSchema<T>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.params);
      if (!result.success) {
        handleZodError(res, req, result.error, serviceName, 'URL parameters validation failed');
        return;
      }
      req.params = result.data;
      next();
    };
  };
}

export interface ValidationMiddleware {
  validateBody: ReturnType<typeof createValidateBody>;
  validateParams: ReturnType<typeof createValidateParams>;
}

export function createValidation(serviceName: string): ValidationMiddleware {
  return {
    validateBody: createValidateBody(serviceName),
    validateParams: createValidateParams(serviceName),
  };
}
