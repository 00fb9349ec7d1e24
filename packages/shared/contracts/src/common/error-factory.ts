/**
 * Structured Error Factory
 *
 * Creates the failure envelope every controller sends. Internal failures are
 * reported with a fixed message and never carry the underlying error text.
 */

import type { Response } from 'express';
import type { ServiceError } from './index';

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export type BaseErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'SERVICE_UNAVAILABLE'
  | 'DATABASE_ERROR'
  | 'INTERNAL_ERROR';

// Services add their own domain codes (e.g. ENTRY_NOT_FOUND) on top of the base set
export type ErrorCode = BaseErrorCode | (string & {});

export type ErrorType =
  | 'ValidationError'
  | 'NotFoundError'
  | 'ServiceUnavailableError'
  | 'DatabaseError'
  | 'InternalError';

export interface StructuredError {
  type: ErrorType;
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  service?: string;
  correlationId?: string;
}

interface StructuredErrorOptions {
  details?: Record<string, unknown>;
  service?: string;
  correlationId?: string;
}

/**
 * Create a structured error response
 */
export function createStructuredError(
  code: ErrorCode,
  type: ErrorType,
  message: string,
  options?: StructuredErrorOptions
): StructuredError {
  const result: StructuredError = {
    type,
    code,
    message,
  };

  if (options?.details) {
    result.details = options.details;
  }

  if (options?.service) {
    result.service = options.service;
  }

  if (options?.correlationId) {
    result.correlationId = options.correlationId;
  }

  return result;
}

/**
 * Send a structured error response
 */
export function sendStructuredError(res: Response, statusCode: number, error: StructuredError): void {
  const responseError: ServiceError = {
    type: error.type,
    code: error.code,
    message: error.message,
    ...(error.details && { details: error.details }),
    ...(error.service && { service: error.service }),
    ...(error.correlationId && { correlationId: error.correlationId }),
  };

  res.status(statusCode).json({
    success: false,
    message: error.message,
    error: responseError,
    timestamp: new Date().toISOString(),
  });
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) return undefined;
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600 ? statusCode : undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Structured Error Factory
 * Use these methods in controllers to create consistent error responses
 */
export const StructuredErrors = {
  /**
   * Validation error (400) - for invalid input
   */
  validation: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 400, createStructuredError('VALIDATION_ERROR', 'ValidationError', message, options));
  },

  /**
   * Not found error (404) - `resource` reads as the subject, e.g. "Entry with ID 7"
   */
  notFound: (res: Response, resource: string, options?: StructuredErrorOptions & { code?: ErrorCode }) => {
    sendStructuredError(
      res,
      404,
      createStructuredError(options?.code ?? 'NOT_FOUND', 'NotFoundError', `${resource} not found`, options)
    );
  },

  /**
   * Create error from caught exception
   * Client errors (4xx carried on a typed error) keep their message; anything else is internal
   */
  fromException: (res: Response, error: unknown, options?: Omit<StructuredErrorOptions, 'details'>) => {
    const statusCode = readStatusCode(error);

    if (statusCode !== undefined && statusCode < 500 && error instanceof Error) {
      const code = readCode(error) ?? statusCodeToErrorCode(statusCode);
      sendStructuredError(
        res,
        statusCode,
        createStructuredError(code, statusCodeToErrorType(statusCode), error.message, options)
      );
      return;
    }

    const serverStatus = statusCode ?? 500;
    sendStructuredError(
      res,
      serverStatus,
      createStructuredError(
        statusCode !== undefined ? (readCode(error) ?? statusCodeToErrorCode(serverStatus)) : 'INTERNAL_ERROR',
        statusCodeToErrorType(serverStatus),
        INTERNAL_ERROR_MESSAGE,
        options
      )
    );
  },
};

export function statusCodeToErrorCode(statusCode: number): BaseErrorCode {
  switch (statusCode) {
    case 400:
    case 422:
      return 'VALIDATION_ERROR';
    case 404:
      return 'NOT_FOUND';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export function statusCodeToErrorType(statusCode: number): ErrorType {
  switch (statusCode) {
    case 400:
    case 413:
    case 422:
      return 'ValidationError';
    case 404:
      return 'NotFoundError';
    case 503:
      return 'ServiceUnavailableError';
    default:
      return 'InternalError';
  }
}

/**
 * Helper to get correlation ID from request headers
 */
export function getCorrelationId(req: { headers: Record<string, string | string[] | undefined> }): string | undefined {
  const value = req.headers['x-correlation-id'] ?? req.headers['x-request-id'];
  return Array.isArray(value) ? value[0] : value;
}
