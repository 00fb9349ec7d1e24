import type { DiaryEntry, EntryChanges, SortOrder } from '../types';

export interface EntryQuery {
  order: SortOrder;
  /** UTC calendar day, `yyyy-MM-dd` */
  day?: string;
  limit?: number;
  offset?: number;
}

export interface NewEntryInput {
  title: string;
  description: string | null;
  date: Date;
}

export interface IEntryRepository {
  create(input: NewEntryInput): Promise<DiaryEntry>;
  findById(id: number): Promise<DiaryEntry | null>;
  exists(id: number): Promise<boolean>;
  count(filter?: { day?: string }): Promise<number>;
  list(query: EntryQuery): Promise<DiaryEntry[]>;
  update(id: number, changes: EntryChanges): Promise<DiaryEntry | null>;
  delete(id: number): Promise<boolean>;
}
