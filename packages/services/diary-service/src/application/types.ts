import type { DiaryEntry, DiaryImage } from '../schema/diary-schema';

export type { DiaryEntry, DiaryImage };

/** An entry together with the ids of its images, ascending. */
export interface EntryWithImages {
  entry: DiaryEntry;
  imgIds: number[];
}

export interface ImageContent {
  imageId: number;
  data: Buffer;
  extension: string;
  contentType: string;
}

export type SortOrder = 'asc' | 'desc';

export interface ListEntriesOptions {
  page: number;
  pageSize: number;
  sortBy: SortOrder;
  filterDate?: Date;
}

export interface EntryChanges {
  title?: string | null;
  description?: string | null;
  date?: Date | null;
}
