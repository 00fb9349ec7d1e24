export * from './diary-schemas';
