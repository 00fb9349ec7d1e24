import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Express } from 'express';
import type { DatabaseHealth } from '@diary/platform-core';
import {
  DeletionResponseSchema,
  EntryResponseSchema,
  EntryListResponseSchema,
  EntryWithImagesResponseSchema,
  ImageResponseSchema,
  PaginatedEntriesResponseSchema,
} from '@diary/shared-contracts';
import { createImageBytes } from '@diary/test-utils';
import { createApp } from '../../app';
import { DiaryService } from '../../application/services/DiaryService';
import { ImageService } from '../../application/services/ImageService';
import { LocalBlobStore } from '../../infrastructure/providers/LocalBlobStore';
import { InMemoryDiaryStore } from '../fakes/InMemoryDiaryStore';

describe('diary routes', () => {
  let tempRoot: string;
  let store: InMemoryDiaryStore;
  let blobs: LocalBlobStore;
  let databaseHealth: DatabaseHealth;
  let app: Express;

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'diary-routes-'));
    store = new InMemoryDiaryStore();
    blobs = new LocalBlobStore(path.join(tempRoot, 'uploads'));
    await blobs.ensureReady();
    databaseHealth = { healthy: true, latencyMs: 2 };

    app = createApp({
      diaryService: new DiaryService(store.withScope, blobs),
      imageService: new ImageService(store.withScope, blobs),
      checkDatabase: async () => databaseHealth,
    });
  });

  afterEach(async () => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  describe('POST /api/diary/entries', () => {
    it('should create an entry', async () => {
      const response = await request(app).post('/api/diary/entries').send({
        title: 'Morning walk',
        description: 'Along the river',
        date: '2024-05-01T08:30:00.000Z',
      });

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.message).toBe('Entry created successfully');
      expect(response.body.data).toEqual({
        id: 1,
        title: 'Morning walk',
        description: 'Along the river',
        date: '2024-05-01T08:30:00.000Z',
      });
      expect(EntryResponseSchema.safeParse(response.body).success).toBe(true);
    });

    it('should trim the title and default the description to null', async () => {
      const response = await request(app).post('/api/diary/entries').send({ title: '  Short  ' });

      expect(response.status).toBe(201);
      expect(response.body.data.title).toBe('Short');
      expect(response.body.data.description).toBeNull();
    });

    it.each([
      ['blank', { title: '   ' }],
      ['missing', { description: 'No title here' }],
    ])('should reject a %s title', async (_label, body) => {
      const response = await request(app)
        .post('/api/diary/entries')
        .set('x-correlation-id', 'corr-42')
        .send(body);

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.message).toBe('Title is required');
      expect(response.body.error).toMatchObject({
        type: 'ValidationError',
        code: 'VALIDATION_ERROR',
        message: 'Title is required',
        service: 'diary-service',
        correlationId: 'corr-42',
      });
      expect(store.entries.size).toBe(0);
    });

    it('should reject an unparseable date', async () => {
      const response = await request(app).post('/api/diary/entries').send({ title: 'Trip', date: 'someday' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Date must be a valid date');
    });
  });

  describe('GET /api/diary/entries', () => {
    beforeEach(() => {
      store.seedEntry({ title: 'One', date: new Date('2024-01-01T09:00:00.000Z') });
      store.seedEntry({ title: 'Two', date: new Date('2024-01-02T09:00:00.000Z') });
      store.seedEntry({ title: 'Three', date: new Date('2024-01-03T09:00:00.000Z') });
    });

    it('should return the requested page', async () => {
      const response = await request(app).get('/api/diary/entries?page=2&pageSize=2&sortBy=asc');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Entries retrieved successfully');
      expect(response.body.data).toEqual({
        items: [
          {
            entry: { id: 3, title: 'Three', description: null, date: '2024-01-03T09:00:00.000Z' },
            imgIds: [],
          },
        ],
        total: 3,
        page: 2,
        pageSize: 2,
        totalPages: 2,
      });
      expect(PaginatedEntriesResponseSchema.safeParse(response.body).success).toBe(true);
    });

    it('should default to newest first with ten per page', async () => {
      const response = await request(app).get('/api/diary/entries');

      expect(response.body.data.page).toBe(1);
      expect(response.body.data.pageSize).toBe(10);
      expect(response.body.data.items.map((item: { entry: { id: number } }) => item.entry.id)).toEqual([3, 2, 1]);
    });

    it('should filter by day and ignore an unreadable filter', async () => {
      const filtered = await request(app).get('/api/diary/entries?filterDate=2024-01-02');
      const ignored = await request(app).get('/api/diary/entries?filterDate=not-a-date');

      expect(filtered.body.data.total).toBe(1);
      expect(filtered.body.data.items[0].entry.title).toBe('Two');
      expect(ignored.status).toBe(200);
      expect(ignored.body.data.total).toBe(3);
    });

    it('should answer storage failures with the generic error', async () => {
      vi.spyOn(store.repositories.entries, 'count').mockRejectedValueOnce(
        new Error('relation "diary_entries" does not exist')
      );

      const response = await request(app).get('/api/diary/entries');

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Internal server error');
      expect(response.body.error).toEqual({
        type: 'InternalError',
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
        service: 'diary-service',
      });
      expect(JSON.stringify(response.body)).not.toContain('diary_entries');
    });
  });

  describe('GET /api/diary/entries/by-date/:date', () => {
    it('should list the entries of that day', async () => {
      store.seedEntry({ title: 'Late', date: new Date('2024-03-05T21:00:00.000Z') });
      store.seedEntry({ title: 'Early', date: new Date('2024-03-05T06:00:00.000Z') });
      store.seedEntry({ title: 'Next day', date: new Date('2024-03-06T06:00:00.000Z') });

      const response = await request(app).get('/api/diary/entries/by-date/2024-03-05');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Entries for 2024-03-05 retrieved successfully');
      expect(response.body.data.map((item: { entry: { title: string } }) => item.entry.title)).toEqual([
        'Early',
        'Late',
      ]);
      expect(EntryListResponseSchema.safeParse(response.body).success).toBe(true);
    });

    it.each(['2024-13-01', '2024-02-30', '05-03-2024'])('should reject %s', async date => {
      const response = await request(app).get(`/api/diary/entries/by-date/${date}`);

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Invalid date format. Use yyyy-MM-dd');
    });
  });

  describe('entry by id', () => {
    it('should return the entry with its image ids', async () => {
      const entry = store.seedEntry({ title: 'Picnic', date: new Date('2024-06-01T12:00:00.000Z') });
      await store.repositories.images.create(entry.id);

      const response = await request(app).get(`/api/diary/entries/${entry.id}`);

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Entry retrieved successfully');
      expect(response.body.data).toEqual({
        entry: { id: 1, title: 'Picnic', description: null, date: '2024-06-01T12:00:00.000Z' },
        imgIds: [1],
      });
      expect(EntryWithImagesResponseSchema.safeParse(response.body).success).toBe(true);
    });

    it('should answer 404 for an unknown entry', async () => {
      const response = await request(app).get('/api/diary/entries/99');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Entry with ID 99 not found');
      expect(response.body.error).toMatchObject({ type: 'NotFoundError', code: 'ENTRY_NOT_FOUND' });
    });

    it.each(['abc', '0', '-4', '1.5'])('should reject the id %s', async id => {
      const response = await request(app).get(`/api/diary/entries/${id}`);

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('ID must be a positive integer');
    });

    it('should update only the provided fields', async () => {
      const entry = store.seedEntry({ title: 'Draft', description: 'Keep', date: new Date('2024-06-01T12:00:00.000Z') });

      const response = await request(app).put(`/api/diary/entries/${entry.id}`).send({ title: 'Final' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Entry updated successfully');
      expect(response.body.data).toEqual({
        id: entry.id,
        title: 'Final',
        description: 'Keep',
        date: '2024-06-01T12:00:00.000Z',
      });
    });

    it('should answer 404 when updating an unknown entry', async () => {
      const response = await request(app).put('/api/diary/entries/5').send({ title: 'Nothing' });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Entry with ID 5 not found');
    });

    it('should delete an entry once', async () => {
      const entry = store.seedEntry();

      const first = await request(app).delete(`/api/diary/entries/${entry.id}`);
      const second = await request(app).delete(`/api/diary/entries/${entry.id}`);

      expect(first.status).toBe(200);
      expect(first.body).toMatchObject({ success: true, message: 'Entry deleted successfully', data: true });
      expect(DeletionResponseSchema.safeParse(first.body).success).toBe(true);
      expect(second.status).toBe(404);
    });
  });

  describe('images', () => {
    it('should upload an image and serve the same bytes back', async () => {
      const entry = store.seedEntry();
      const bytes = createImageBytes(256);

      const upload = await request(app)
        .post(`/api/diary/entries/${entry.id}/images`)
        .attach('image', bytes, 'holiday.png');

      expect(upload.status).toBe(201);
      expect(upload.body.message).toBe('Image uploaded successfully');
      expect(upload.body.data).toMatchObject({ id: 1, entryId: entry.id });
      expect(ImageResponseSchema.safeParse(upload.body).success).toBe(true);

      const download = await request(app).get('/api/diary/images/1').buffer(true);

      expect(download.status).toBe(200);
      expect(download.headers['content-type']).toBe('image/png');
      expect(download.headers['content-disposition']).toBe('attachment; filename="image_1.png"');
      expect(Buffer.compare(download.body, bytes)).toBe(0);
    });

    it('should reject a disallowed file type', async () => {
      const entry = store.seedEntry();

      const response = await request(app)
        .post(`/api/diary/entries/${entry.id}/images`)
        .attach('image', Buffer.from('plain text'), 'notes.txt');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe(
        "File type '.txt' is not allowed. Allowed types: .jpg, .jpeg, .png, .gif, .webp"
      );
      expect(response.body.error.code).toBe('INVALID_FILE_TYPE');
      expect(store.images.size).toBe(0);
    });

    it('should reject an upload without a file', async () => {
      const entry = store.seedEntry();

      const response = await request(app).post(`/api/diary/entries/${entry.id}/images`).field('caption', 'none');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Image file is required');
    });

    it('should reject a file sent under another field name', async () => {
      const entry = store.seedEntry();

      const response = await request(app)
        .post(`/api/diary/entries/${entry.id}/images`)
        .attach('photo', createImageBytes(), 'photo.png');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Image must be sent in the "image" field');
      expect(response.body.error.details).toEqual({ code: 'LIMIT_UNEXPECTED_FILE' });
    });

    it('should reject an upload for a missing entry', async () => {
      const response = await request(app)
        .post('/api/diary/entries/42/images')
        .attach('image', createImageBytes(), 'photo.jpg');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Diary entry with ID 42 not found');
      expect(response.body.error.code).toBe('ENTRY_REFERENCE_INVALID');
      await expect(fs.readdir(blobs.basePath)).resolves.toEqual([]);
    });

    it('should delete an image and then report it missing', async () => {
      const entry = store.seedEntry();
      await request(app).post(`/api/diary/entries/${entry.id}/images`).attach('image', createImageBytes(), 'a.gif');

      const deleted = await request(app).delete('/api/diary/images/1');
      const fetched = await request(app).get('/api/diary/images/1');

      expect(deleted.status).toBe(200);
      expect(deleted.body).toMatchObject({ message: 'Image deleted successfully', data: true });
      expect(fetched.status).toBe(404);
      expect(fetched.body.message).toBe('Image with ID 1 not found');
      expect(fetched.body.error.code).toBe('IMAGE_NOT_FOUND');
      await expect(fs.readdir(blobs.basePath)).resolves.toEqual([]);
    });

    it('should answer 404 when deleting an unknown image', async () => {
      const response = await request(app).delete('/api/diary/images/5');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Image with ID 5 not found');
    });

    it('should remove image files when their entry is deleted', async () => {
      const entry = store.seedEntry();
      await request(app).post(`/api/diary/entries/${entry.id}/images`).attach('image', createImageBytes(), 'a.webp');
      await request(app).post(`/api/diary/entries/${entry.id}/images`).attach('image', createImageBytes(), 'b.jpeg');

      const response = await request(app).delete(`/api/diary/entries/${entry.id}`);

      expect(response.status).toBe(200);
      expect(store.images.size).toBe(0);
      await expect(fs.readdir(blobs.basePath)).resolves.toEqual([]);
    });
  });

  describe('health and fallbacks', () => {
    it('should report healthy when the database answers', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        status: 'healthy',
        service: 'diary-service',
        dependencies: { database: { status: 'healthy', latencyMs: 2 } },
      });
    });

    it('should report unhealthy with 503 when the database is down', async () => {
      databaseHealth = { healthy: false, latencyMs: 5, error: 'connect ECONNREFUSED' };

      const response = await request(app).get('/api/diary/health');

      expect(response.status).toBe(503);
      expect(response.body.data.status).toBe('unhealthy');
      expect(response.body.data.dependencies.database).toEqual({
        status: 'unhealthy',
        latencyMs: 5,
        error: 'connect ECONNREFUSED',
      });
    });

    it('should answer unknown routes with 404', async () => {
      const response = await request(app).get('/api/diary/unknown/path');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Route GET /api/diary/unknown/path not found');
    });

    it('should echo the correlation id header', async () => {
      const response = await request(app).get('/api/diary/entries').set('x-correlation-id', 'trace-7');

      expect(response.headers['x-correlation-id']).toBe('trace-7');
    });
  });
});
