/**
 * Logging Middleware
 *
 * Express middleware for request logging with correlation
 */

import type { Request, Response, NextFunction } from 'express';
import type { LogContext } from './types';
import { getLogger } from './logger';
import { correlationStorage, generateCorrelationId } from './correlation';
import { maskIpAddress } from './formatting';

export const CORRELATION_HEADER = 'x-correlation-id';

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim().length > 0 ? first.trim() : undefined;
}

/**
 * Express middleware for request logging with correlation ID
 */
export function requestLogger(serviceName: string) {
  const logger = getLogger(serviceName);

  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId = headerValue(req.headers[CORRELATION_HEADER]) ?? generateCorrelationId();
    const startedAt = Date.now();

    const context: LogContext = {
      correlationId,
      service: serviceName,
      method: req.method,
      url: req.originalUrl,
    };

    res.setHeader(CORRELATION_HEADER, correlationId);
    res.on('finish', () => {
      logger.debug('Request completed', {
        ...context,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
        ip: req.ip ? maskIpAddress(req.ip) : undefined,
      });
    });

    correlationStorage.run(context, () => {
      next();
    });
  };
}
