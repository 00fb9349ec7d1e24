export type { IEntryRepository, EntryQuery, NewEntryInput } from './IEntryRepository';
export type { IImageRepository } from './IImageRepository';
export type { IBlobStore } from './IBlobStore';
export type { ConnectionScope, DiaryRepositories } from './ConnectionScope';
