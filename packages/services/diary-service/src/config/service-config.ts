/**
 * Diary Service Configuration
 * Service-specific settings parsed from the environment once at startup.
 * Platform-level concerns (logging, database pooling, shutdown) live in platform-core.
 */

import path from 'path';
import { z } from 'zod';
import { DomainError, getLogger } from '@diary/platform-core';

export const SERVICE_NAME = 'diary-service';

export { getLogger };

const optionalInt = (min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? Number(value) : undefined))
    .pipe(z.number().int().min(min).optional());

const DiaryEnvSchema = z.object({
  PORT: optionalInt(1).pipe(z.number().max(65535).default(3020)),
  DIARY_DATABASE_URL: z.string().trim().optional(),
  DATABASE_URL: z.string().trim().optional(),
  UPLOADS_DIR: z.string().trim().default('./uploads'),
  CORS_ORIGIN: z.string().trim().default('*'),
  SHUTDOWN_TIMEOUT_MS: optionalInt(0),
  DATABASE_POOL_MAX: optionalInt(1),
});

export interface DiaryServiceConfig {
  port: number;
  databaseUrl: string;
  uploadsDir: string;
  corsOrigin: string | string[];
  shutdownTimeoutMs?: number;
  databasePoolMax?: number;
}

function parseCorsOrigin(raw: string): string | string[] {
  if (raw === '' || raw === '*') return '*';
  const origins = raw
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean);
  return origins.length === 1 ? origins[0] : origins;
}

export function loadDiaryConfig(env: NodeJS.ProcessEnv = process.env): DiaryServiceConfig {
  const result = DiaryEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new DomainError(`Invalid diary-service configuration: ${issues}`, 500);
  }

  const parsed = result.data;
  const databaseUrl = parsed.DIARY_DATABASE_URL || parsed.DATABASE_URL;
  if (!databaseUrl) {
    throw new DomainError('DIARY_DATABASE_URL or DATABASE_URL environment variable is required for diary-service', 500);
  }

  return {
    port: parsed.PORT,
    databaseUrl,
    uploadsDir: path.resolve(parsed.UPLOADS_DIR || './uploads'),
    corsOrigin: parseCorsOrigin(parsed.CORS_ORIGIN),
    shutdownTimeoutMs: parsed.SHUTDOWN_TIMEOUT_MS,
    databasePoolMax: parsed.DATABASE_POOL_MAX,
  };
}
