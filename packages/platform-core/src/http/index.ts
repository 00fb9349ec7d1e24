export * from './response-helpers';
