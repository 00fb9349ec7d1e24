export { createMockEntry, createMockImage, createImageBytes } from './entity-factories';
export type { MockDiaryEntry, MockDiaryImage } from './entity-factories';

export { createMockLogger } from './logger-mock';
export type { MockLogger } from './logger-mock';

export { createMockDb } from './db-helpers';
export type { MockDb } from './db-helpers';
