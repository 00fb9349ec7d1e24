import { z } from 'zod';
import { PaginatedResponseSchema, ServiceResponseSchema } from '../common/index';

const MAX_SERIAL_ID = 2_147_483_647;

export const DATE_PARAM_FORMAT_MESSAGE = 'Invalid date format. Use yyyy-MM-dd';

const TitleSchema = z
  .string({ required_error: 'Title is required', invalid_type_error: 'Title must be a string' })
  .trim()
  .min(1, 'Title is required')
  .max(255, 'Title must be at most 255 characters');

const DateInputSchema = z.coerce.date({ errorMap: () => ({ message: 'Date must be a valid date' }) });

const SerialIdSchema = z
  .string()
  .regex(/^[1-9]\d*$/, 'ID must be a positive integer')
  .refine(value => Number(value) <= MAX_SERIAL_ID, 'ID must be a positive integer');

function isCalendarDay(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

// Requests

export const CreateEntryRequestSchema = z.object({
  title: TitleSchema,
  description: z.string().nullish(),
  date: DateInputSchema.nullish(),
});
export type CreateEntryRequest = z.infer<typeof CreateEntryRequestSchema>;

// null and omitted fields both leave the stored value in place
export const UpdateEntryRequestSchema = z.object({
  title: TitleSchema.nullish(),
  description: z.string().nullish(),
  date: DateInputSchema.nullish(),
});
export type UpdateEntryRequest = z.infer<typeof UpdateEntryRequestSchema>;

export const EntryIdParamsSchema = z.object({ id: SerialIdSchema });
export const EntryImagesParamsSchema = z.object({ entryId: SerialIdSchema });
export const ImageIdParamsSchema = z.object({ id: SerialIdSchema });

export const EntryDateParamsSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, DATE_PARAM_FORMAT_MESSAGE)
    .refine(isCalendarDay, DATE_PARAM_FORMAT_MESSAGE),
});

// Responses (wire form: dates arrive as ISO strings)

export const DiaryEntrySchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string().nullable(),
  date: z.string().datetime(),
});
export type DiaryEntryDto = z.infer<typeof DiaryEntrySchema>;

export const DiaryImageSchema = z.object({
  id: z.number().int().positive(),
  entryId: z.number().int().positive(),
  createdAt: z.string().datetime(),
});
export type DiaryImageDto = z.infer<typeof DiaryImageSchema>;

export const EntryWithImagesSchema = z.object({
  entry: DiaryEntrySchema,
  imgIds: z.array(z.number().int().positive()),
});
export type EntryWithImagesDto = z.infer<typeof EntryWithImagesSchema>;

export const EntryResponseSchema = ServiceResponseSchema(DiaryEntrySchema);
export const EntryWithImagesResponseSchema = ServiceResponseSchema(EntryWithImagesSchema);
export const EntryListResponseSchema = ServiceResponseSchema(z.array(EntryWithImagesSchema));
export const PaginatedEntriesResponseSchema = ServiceResponseSchema(PaginatedResponseSchema(EntryWithImagesSchema));
export const ImageResponseSchema = ServiceResponseSchema(DiaryImageSchema);
export const DeletionResponseSchema = ServiceResponseSchema(z.literal(true));
