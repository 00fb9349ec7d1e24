export { DrizzleEntryRepository } from './DrizzleEntryRepository';
export { DrizzleImageRepository } from './DrizzleImageRepository';
