import { asc, eq } from 'drizzle-orm';
import type { IImageRepository } from '../../application/interfaces';
import type { DiaryImage } from '../../application/types';
import { DiaryError } from '../../application/errors';
import { diaryImages } from '../../schema/diary-schema';
import type { DatabaseConnection } from '../database/DatabaseConnectionFactory';

export class DrizzleImageRepository implements IImageRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async create(entryId: number): Promise<DiaryImage> {
    const [image] = await this.db.insert(diaryImages).values({ entryId }).returning();
    if (!image) {
      throw DiaryError.internalError(`Image insert for entry ${entryId} returned no row`);
    }
    return image;
  }

  async findById(id: number): Promise<DiaryImage | null> {
    const [image] = await this.db.select().from(diaryImages).where(eq(diaryImages.id, id)).limit(1);
    return image ?? null;
  }

  async listIdsByEntry(entryId: number): Promise<number[]> {
    const rows = await this.db
      .select({ id: diaryImages.id })
      .from(diaryImages)
      .where(eq(diaryImages.entryId, entryId))
      .orderBy(asc(diaryImages.id));
    return rows.map(row => row.id);
  }

  async delete(id: number): Promise<boolean> {
    const rows = await this.db.delete(diaryImages).where(eq(diaryImages.id, id)).returning({ id: diaryImages.id });
    return rows.length > 0;
  }
}
