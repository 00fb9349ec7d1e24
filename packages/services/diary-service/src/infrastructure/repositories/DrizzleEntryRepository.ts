/**
 * Drizzle Entry Repository
 * diary_entries persistence over one scoped connection.
 */

import { asc, count, desc, eq, sql, type SQL } from 'drizzle-orm';
import type { EntryQuery, IEntryRepository, NewEntryInput } from '../../application/interfaces';
import type { DiaryEntry, EntryChanges } from '../../application/types';
import { DiaryError } from '../../application/errors';
import { diaryEntries, type NewDiaryEntry } from '../../schema/diary-schema';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';

const entryColumns = {
  id: diaryEntries.id,
  title: diaryEntries.title,
  description: diaryEntries.description,
  date: diaryEntries.date,
};

function onUtcDay(day?: string): SQL | undefined {
  return day ? sql`(${diaryEntries.date} AT TIME ZONE 'UTC')::date = ${day}::date` : undefined;
}

export class DrizzleEntryRepository implements IEntryRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async create(input: NewEntryInput): Promise<DiaryEntry> {
    const [entry] = await this.db.insert(diaryEntries).values(input).returning(entryColumns);
    if (!entry) {
      throw DiaryError.internalError('Entry insert returned no row');
    }
    return entry;
  }

  async findById(id: number): Promise<DiaryEntry | null> {
    const [entry] = await this.db.select(entryColumns).from(diaryEntries).where(eq(diaryEntries.id, id)).limit(1);
    return entry ?? null;
  }

  async exists(id: number): Promise<boolean> {
    const rows = await this.db
      .select({ id: diaryEntries.id })
      .from(diaryEntries)
      .where(eq(diaryEntries.id, id))
      .limit(1);
    return rows.length > 0;
  }

  async count(filter: { day?: string } = {}): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(diaryEntries).where(onUtcDay(filter.day));
    return row?.value ?? 0;
  }

  // Ties on date keep a stable order by id, in the same direction
  async list(query: EntryQuery): Promise<DiaryEntry[]> {
    const direction = query.order === 'asc' ? asc : desc;
    let statement = this.db
      .select(entryColumns)
      .from(diaryEntries)
      .where(onUtcDay(query.day))
      .orderBy(direction(diaryEntries.date), direction(diaryEntries.id))
      .$dynamic();

    if (query.limit !== undefined) {
      statement = statement.limit(query.limit);
    }
    if (query.offset !== undefined) {
      statement = statement.offset(query.offset);
    }
    return statement;
  }

  async update(id: number, changes: EntryChanges): Promise<DiaryEntry | null> {
    const values: Partial<NewDiaryEntry> = {};
    if (changes.title != null) values.title = changes.title;
    if (changes.description != null) values.description = changes.description;
    if (changes.date != null) values.date = changes.date;

    if (Object.keys(values).length === 0) {
      return this.findById(id);
    }

    const [entry] = await this.db
      .update(diaryEntries)
      .set(values)
      .where(eq(diaryEntries.id, id))
      .returning(entryColumns);
    return entry ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const rows = await this.db
      .delete(diaryEntries)
      .where(eq(diaryEntries.id, id))
      .returning({ id: diaryEntries.id });
    return rows.length > 0;
  }
}
