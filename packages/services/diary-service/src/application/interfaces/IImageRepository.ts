import type { DiaryImage } from '../types';

export interface IImageRepository {
  create(entryId: number): Promise<DiaryImage>;
  findById(id: number): Promise<DiaryImage | null>;
  listIdsByEntry(entryId: number): Promise<number[]>;
  delete(id: number): Promise<boolean>;
}
