/**
 * Diary Service Database Schema
 *
 * Mirrors schema/init.sql, which creates the tables at startup.
 */

import { pgTable, serial, varchar, text, timestamp, integer, index } from 'drizzle-orm/pg-core';

export const diaryEntries = pgTable(
  'diary_entries',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    description: text('description'),
    date: timestamp('date', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  table => [index('idx_diary_entries_date').on(table.date)]
);

/**
 * Image rows only record ownership; the bytes live in the blob store under `{id}{extension}`.
 */
export const diaryImages = pgTable(
  'diary_images',
  {
    id: serial('id').primaryKey(),
    entryId: integer('entry_id')
      .notNull()
      .references(() => diaryEntries.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  table => [index('idx_diary_images_entry_id').on(table.entryId)]
);

export type DiaryEntryRow = typeof diaryEntries.$inferSelect;
export type NewDiaryEntry = typeof diaryEntries.$inferInsert;

// createdAt is store-maintained and not part of the entry view
export type DiaryEntry = Omit<DiaryEntryRow, 'createdAt'>;

export type DiaryImage = typeof diaryImages.$inferSelect;
