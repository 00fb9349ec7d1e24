/**
 * Platform Core - shared building blocks for diary services
 *
 * - Structured logging with correlation tracking
 * - Error model and express error middleware
 * - Database connection factory
 * - Response envelopes and request validation
 * - Configuration and graceful shutdown
 */

export * from './config/index';
export * from './error-handling/index';
export * from './http/index';
export * from './logging/index';
export * from './database/index';
export * from './middleware/index';
export * from './lifecycle/index';
