/**
 * Shared contracts for the diary platform
 *
 * Response envelopes, structured errors and request schemas used by every service
 */

export * from './common/index';

export * from './api/index';
