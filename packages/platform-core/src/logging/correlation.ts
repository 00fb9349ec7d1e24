/**
 * Correlation Context
 *
 * Carries a per-request correlation id across async boundaries
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

export function generateCorrelationId(): string {
  return randomUUID();
}
