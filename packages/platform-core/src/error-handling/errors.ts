import type { Request, Response, NextFunction } from 'express';
import { StructuredErrors, getCorrelationId } from '@diary/shared-contracts';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const middlewareLogger = getLogger('error-handling:middleware');
const processLogger = getLogger('error-handling:process');

export enum DomainErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public declare readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, cause, code);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

type BaseCodeKey = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'INTERNAL_ERROR' | 'SERVICE_UNAVAILABLE';

/**
 * Builds a service-scoped error class. `domainErrorCodes` must map the base
 * keys; services add their own codes alongside them.
 */
export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: Record<BaseCodeKey, T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName);
    }

    static notFound(resource: string, id?: string | number) {
      const msg = id !== undefined ? `${resource} with ID ${id} not found` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(message: string, code?: T) {
      return new ServiceError(message, 400, code ?? domainErrorCodes.VALIDATION_ERROR);
    }

    static internalError(message: string, cause?: Error, code?: T) {
      return new ServiceError(message, 500, code ?? domainErrorCodes.INTERNAL_ERROR, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Terminal express error middleware. Client errors keep their message;
 * everything else is logged in full and answered with the generic 500 body.
 */
export function errorHandler() {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = getCorrelationId(req);

    if (error instanceof DomainError && error.isClientError) {
      middlewareLogger.warn('Request rejected', {
        code: error.code,
        statusCode: error.statusCode,
        correlationId,
        url: req.originalUrl,
        method: req.method,
      });
    } else {
      middlewareLogger.error('Unhandled error', {
        error: serializeError(error),
        correlationId,
        url: req.originalUrl,
        method: req.method,
      });
    }

    StructuredErrors.fromException(res, error, { correlationId });
  };
}

export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}

let globalHandlersRegistered = false;

export function registerGlobalErrorHandlers(): void {
  if (globalHandlersRegistered) return;
  globalHandlersRegistered = true;

  process.on('uncaughtException', (error: Error) => {
    processLogger.error('Uncaught exception', { error: serializeError(error) });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    processLogger.error('Unhandled promise rejection', { error: serializeError(reason) });
  });
}
