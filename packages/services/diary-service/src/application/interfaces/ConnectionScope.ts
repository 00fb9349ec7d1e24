import type { IEntryRepository } from './IEntryRepository';
import type { IImageRepository } from './IImageRepository';

export interface DiaryRepositories {
  entries: IEntryRepository;
  images: IImageRepository;
}

/**
 * Runs one unit of work against repositories bound to a single checked-out
 * connection, which is returned when the work settles.
 */
export type ConnectionScope = <T>(work: (repos: DiaryRepositories) => Promise<T>) => Promise<T>;
