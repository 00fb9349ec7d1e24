/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';
import type { LogContext } from './types';

// Key-based matching
const SECRET_PATTERNS = [
  /authorization/i,
  /set-cookie/i,
  /api[-_]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /connection[-_]?string/i,
  /database[-_]?url/i,
];

// Diary text is personal content and never reaches the logs
const DIARY_TEXT_FIELDS = new Set(['title', 'description']);

/**
 * Mask an IP address
 * 192.168.1.100 -> 192.168.***.***
 */
export function maskIpAddress(ip: string): string {
  if (ip.includes(':')) {
    const parts = ip.split(':');
    return parts.slice(0, 4).join(':') + ':***:***:***:***';
  }
  const parts = ip.split('.');
  if (parts.length !== 4) return '[IP]';
  return `${parts[0]}.${parts[1]}.***.***`;
}

/**
 * Redacts secrets and diary text from objects
 */
export function maskSecrets(obj: unknown, maxDepth = 4): unknown {
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else if (DIARY_TEXT_FIELDS.has(key)) {
      masked[key] = '[DIARY_CONTENT_REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSecrets(value, maxDepth - 1);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

type CorrelationSource = { getStore: () => LogContext | undefined };

/**
 * Development console format
 */
export function createDevFormat(correlationStorage: CorrelationSource): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, ...meta }) => {
      const finalCorrelationId = correlationId || correlationStorage.getStore()?.correlationId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(correlationStorage: CorrelationSource): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
      }
      return safeStringify(info, 50000);
    })
  );
}
