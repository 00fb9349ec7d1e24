/**
 * Local Blob Store
 * Keeps image bytes as flat files in one directory on the local filesystem.
 */

import fs from 'fs/promises';
import path from 'path';
import type { IBlobStore } from '../../application/interfaces';
import { DiaryError } from '../../application/errors';
import { getLogger } from '../../config/service-config';

const logger = getLogger('diary-service-localblobstore');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalBlobStore implements IBlobStore {
  readonly basePath: string;

  constructor(basePath: string = './uploads') {
    this.basePath = path.resolve(basePath);
  }

  async ensureReady(): Promise<void> {
    await fs.mkdir(this.basePath, { recursive: true });
    logger.debug('Upload directory ready', { basePath: this.basePath });
  }

  async write(key: string, data: Buffer): Promise<void> {
    await fs.writeFile(this.resolveKey(key), data);
  }

  async read(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolveKey(key));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.resolveKey(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.resolveKey(key));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async findByProbe(id: number, extensions: readonly string[]): Promise<string | null> {
    for (const extension of extensions) {
      const key = `${id}${extension}`;
      if (await this.exists(key)) return key;
    }
    return null;
  }

  private resolveKey(key: string): string {
    if (!key || key.includes('/') || key.includes('\\') || key.includes('..')) {
      throw DiaryError.internalError(`Invalid blob key '${key}'`);
    }
    return path.join(this.basePath, key);
  }
}
