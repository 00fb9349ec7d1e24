/**
 * Diary Service
 * Entry lifecycle: create, paginated listing, per-day listing, lookup, update and
 * delete. Every operation runs inside its own connection scope.
 */

import type { PaginatedResponse } from '@diary/shared-contracts';
import type { ConnectionScope, DiaryRepositories, IBlobStore } from '../interfaces';
import type { DiaryEntry, EntryChanges, EntryWithImages, ListEntriesOptions } from '../types';
import { getLogger } from '../../config/service-config';
import { ALLOWED_IMAGE_EXTENSIONS } from './image-rules';
import { normalizeListOptions, toUtcDay } from './list-options';

const logger = getLogger('diary-service-diaryservice');

export class DiaryService {
  constructor(
    private readonly withScope: ConnectionScope,
    private readonly blobStore: IBlobStore
  ) {}

  async createEntry(title: string, description?: string | null, date?: Date | null): Promise<DiaryEntry> {
    return this.withScope(async ({ entries }) => {
      const entry = await entries.create({
        title,
        description: description ?? null,
        date: date ?? new Date(),
      });
      logger.info('Diary entry created', { entryId: entry.id });
      return entry;
    });
  }

  async getEntries(options: Partial<ListEntriesOptions> = {}): Promise<PaginatedResponse<EntryWithImages>> {
    const { page, pageSize, sortBy, filterDate } = normalizeListOptions(options);
    const day = filterDate ? toUtcDay(filterDate) : undefined;

    return this.withScope(async repos => {
      const total = await repos.entries.count({ day });
      const rows = await repos.entries.list({
        order: sortBy,
        day,
        limit: pageSize,
        offset: (page - 1) * pageSize,
      });

      return {
        items: await this.attachImageIds(repos, rows),
        total,
        page,
        pageSize,
        totalPages: Math.ceil(total / pageSize),
      };
    });
  }

  async getEntriesByDate(date: Date): Promise<EntryWithImages[]> {
    const day = toUtcDay(date);
    return this.withScope(async repos => {
      const rows = await repos.entries.list({ order: 'asc', day });
      return this.attachImageIds(repos, rows);
    });
  }

  async getEntryById(id: number): Promise<EntryWithImages | null> {
    return this.withScope(async ({ entries, images }) => {
      const entry = await entries.findById(id);
      if (!entry) return null;
      return { entry, imgIds: await images.listIdsByEntry(id) };
    });
  }

  async updateEntry(id: number, changes: EntryChanges): Promise<DiaryEntry | null> {
    return this.withScope(async ({ entries }) => {
      const updated = await entries.update(id, changes);
      if (updated) {
        logger.info('Diary entry updated', { entryId: id });
      }
      return updated;
    });
  }

  /**
   * Removes the entry's blobs before the row; the image rows go with the entry
   * through the foreign key cascade.
   */
  async deleteEntry(id: number): Promise<boolean> {
    return this.withScope(async ({ entries, images }) => {
      if (!(await entries.exists(id))) return false;

      const imageIds = await images.listIdsByEntry(id);
      for (const imageId of imageIds) {
        const key = await this.blobStore.findByProbe(imageId, ALLOWED_IMAGE_EXTENSIONS);
        if (key) {
          await this.blobStore.delete(key);
        }
      }

      const deleted = await entries.delete(id);
      logger.info('Diary entry deleted', { entryId: id, imageCount: imageIds.length });
      return deleted;
    });
  }

  // One image-id query per entry
  private async attachImageIds(repos: DiaryRepositories, rows: DiaryEntry[]): Promise<EntryWithImages[]> {
    const result: EntryWithImages[] = [];
    for (const entry of rows) {
      result.push({ entry, imgIds: await repos.images.listIdsByEntry(entry.id) });
    }
    return result;
  }
}
