import { describe, it, expect } from 'vitest';
import {
  CreateEntryRequestSchema,
  UpdateEntryRequestSchema,
  EntryIdParamsSchema,
  EntryDateParamsSchema,
  EntryResponseSchema,
  DATE_PARAM_FORMAT_MESSAGE,
} from '../api/diary-schemas';

describe('diary request schemas', () => {
  describe('CreateEntryRequestSchema', () => {
    it('should trim the title and coerce the date', () => {
      const parsed = CreateEntryRequestSchema.parse({
        title: '  Rainy Sunday ',
        description: 'Stayed in and read.',
        date: '2024-03-10T09:15:00.000Z',
      });

      expect(parsed.title).toBe('Rainy Sunday');
      expect(parsed.description).toBe('Stayed in and read.');
      expect(parsed.date).toEqual(new Date('2024-03-10T09:15:00.000Z'));
    });

    it('should allow description and date to be omitted or null', () => {
      expect(CreateEntryRequestSchema.parse({ title: 'Short', description: null })).toEqual({
        title: 'Short',
        description: null,
      });
    });

    it('should require a non-blank title', () => {
      const missing = CreateEntryRequestSchema.safeParse({});
      const blank = CreateEntryRequestSchema.safeParse({ title: '   ' });

      expect(missing.success).toBe(false);
      expect(missing.error?.errors[0].message).toBe('Title is required');
      expect(blank.success).toBe(false);
      expect(blank.error?.errors[0].message).toBe('Title is required');
    });

    it('should reject titles longer than 255 characters', () => {
      const result = CreateEntryRequestSchema.safeParse({ title: 'a'.repeat(256) });

      expect(result.success).toBe(false);
      expect(result.error?.errors[0].message).toBe('Title must be at most 255 characters');
    });

    it('should reject an unparseable date', () => {
      const result = CreateEntryRequestSchema.safeParse({ title: 'Ok', date: 'yesterday-ish' });

      expect(result.success).toBe(false);
      expect(result.error?.errors[0].message).toBe('Date must be a valid date');
    });
  });

  describe('UpdateEntryRequestSchema', () => {
    it('should accept an empty patch', () => {
      expect(UpdateEntryRequestSchema.parse({})).toEqual({});
    });

    it('should still reject a blank title when one is given', () => {
      expect(UpdateEntryRequestSchema.safeParse({ title: '' }).success).toBe(false);
      expect(UpdateEntryRequestSchema.parse({ title: null })).toEqual({ title: null });
    });
  });

  describe('path params', () => {
    it('should accept positive integer ids only', () => {
      expect(EntryIdParamsSchema.safeParse({ id: '15' }).success).toBe(true);
      expect(EntryIdParamsSchema.safeParse({ id: '0' }).success).toBe(false);
      expect(EntryIdParamsSchema.safeParse({ id: '-3' }).success).toBe(false);
      expect(EntryIdParamsSchema.safeParse({ id: '1.5' }).success).toBe(false);
      expect(EntryIdParamsSchema.safeParse({ id: '9999999999' }).success).toBe(false);
    });

    it('should accept real calendar days only', () => {
      expect(EntryDateParamsSchema.safeParse({ date: '2024-02-29' }).success).toBe(true);

      const impossible = EntryDateParamsSchema.safeParse({ date: '2023-02-29' });
      expect(impossible.success).toBe(false);
      expect(impossible.error?.errors[0].message).toBe(DATE_PARAM_FORMAT_MESSAGE);

      expect(EntryDateParamsSchema.safeParse({ date: '10/03/2024' }).success).toBe(false);
    });
  });
});

describe('EntryResponseSchema', () => {
  it('should accept the success envelope of an entry', () => {
    const body = {
      success: true,
      message: 'Entry created successfully',
      data: { id: 4, title: 'Trip', description: null, date: '2024-06-01T00:00:00.000Z' },
      timestamp: '2024-06-01T00:00:01.000Z',
    };

    const parsed = EntryResponseSchema.parse(body);
    expect(parsed.data?.id).toBe(4);
  });

  it('should reject an envelope without a message', () => {
    expect(EntryResponseSchema.safeParse({ success: true }).success).toBe(false);
  });
});
