/**
 * Common Contracts
 *
 * Shared types for common patterns across all services:
 * - API response wrappers
 * - Pagination
 * - Error structures
 * - Health checks
 */

import { z } from 'zod';

export const ServiceErrorSchema = z.object({
  type: z.string(),
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional(),
  service: z.string().optional(),
  correlationId: z.string().optional(),
});
export type ServiceError = z.infer<typeof ServiceErrorSchema>;

export const ServiceResponseSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    success: z.boolean(),
    message: z.string(),
    data: dataSchema.optional(),
    error: ServiceErrorSchema.optional(),
    timestamp: z.string().optional(),
  });

export type ServiceResponse<T> = {
  success: boolean;
  message: string;
  data?: T;
  error?: ServiceError;
  timestamp?: string;
};

export const PaginatedResponseSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
  z.object({
    items: z.array(itemSchema),
    total: z.number().int().nonnegative(),
    page: z.number().int().positive(),
    pageSize: z.number().int().positive(),
    totalPages: z.number().int().nonnegative(),
  });

export type PaginatedResponse<T> = {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
};

export const HealthStatusSchema = z.enum(['healthy', 'degraded', 'unhealthy', 'unknown']);
export type HealthStatus = z.infer<typeof HealthStatusSchema>;

export const ServiceHealthSchema = z.object({
  status: HealthStatusSchema,
  service: z.string(),
  version: z.string().optional(),
  uptime: z.number().optional(),
  timestamp: z.union([z.string(), z.date()]),
  dependencies: z
    .record(
      z.object({
        status: HealthStatusSchema,
        latencyMs: z.number().optional(),
        error: z.string().optional(),
      })
    )
    .optional(),
});
export type ServiceHealth = z.infer<typeof ServiceHealthSchema>;

export * from './error-factory';
