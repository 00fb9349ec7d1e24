/**
 * Image Service
 * Image attachments: the row is written first and the blob second, named after
 * the row id. A failed blob write removes the row and any partial file again.
 */

import type { ConnectionScope, IBlobStore } from '../interfaces';
import type { DiaryImage, ImageContent } from '../types';
import { DiaryError } from '../errors';
import { getLogger } from '../../config/service-config';
import { serializeError, toError } from '@diary/platform-core';
import {
  ALLOWED_IMAGE_EXTENSIONS,
  MAX_IMAGE_BYTES,
  blobKey,
  contentTypeFor,
  imageExtensionOf,
  isAllowedImageExtension,
  maxImageMegabytes,
} from './image-rules';

const logger = getLogger('diary-service-imageservice');

export class ImageService {
  constructor(
    private readonly withScope: ConnectionScope,
    private readonly blobStore: IBlobStore
  ) {}

  async uploadImage(entryId: number, fileBytes: Buffer | null | undefined, fileName: string): Promise<DiaryImage> {
    if (!fileBytes || fileBytes.length === 0) {
      throw DiaryError.imageRequired();
    }
    if (fileBytes.length > MAX_IMAGE_BYTES) {
      throw DiaryError.fileTooLarge(maxImageMegabytes());
    }

    const extension = imageExtensionOf(fileName);
    if (!isAllowedImageExtension(extension)) {
      throw DiaryError.invalidFileType(extension, ALLOWED_IMAGE_EXTENSIONS);
    }

    return this.withScope(async ({ entries, images }) => {
      if (!(await entries.exists(entryId))) {
        throw DiaryError.entryReferenceInvalid(entryId);
      }

      const image = await images.create(entryId);
      const key = blobKey(image.id, extension);
      try {
        await this.blobStore.write(key, fileBytes);
      } catch (error) {
        logger.error('Image blob write failed, removing image row', {
          imageId: image.id,
          entryId,
          error: serializeError(error),
        });
        // A write that failed partway can leave a truncated file behind
        try {
          await this.blobStore.delete(key);
        } catch (cleanupError) {
          logger.error('Failed to remove partial image file after blob write failure', {
            imageId: image.id,
            key,
            error: serializeError(cleanupError),
          });
        }
        try {
          await images.delete(image.id);
        } catch (cleanupError) {
          logger.error('Failed to remove image row after blob write failure', {
            imageId: image.id,
            error: serializeError(cleanupError),
          });
        }
        throw DiaryError.imageWriteFailed(toError(error));
      }

      logger.info('Image uploaded', { imageId: image.id, entryId, size: fileBytes.length, extension });
      return image;
    });
  }

  async getImage(imageId: number): Promise<ImageContent | null> {
    return this.withScope(async ({ images }) => {
      const image = await images.findById(imageId);
      if (!image) return null;

      const key = await this.blobStore.findByProbe(imageId, ALLOWED_IMAGE_EXTENSIONS);
      if (!key) {
        logger.warn('Image row has no stored file', { imageId });
        return null;
      }

      const data = await this.blobStore.read(key);
      if (!data) return null;

      const extension = key.slice(String(imageId).length);
      return { imageId, data, extension, contentType: contentTypeFor(extension) };
    });
  }

  async deleteImage(imageId: number): Promise<boolean> {
    return this.withScope(async ({ images }) => {
      const image = await images.findById(imageId);
      if (!image) return false;

      const key = await this.blobStore.findByProbe(imageId, ALLOWED_IMAGE_EXTENSIONS);
      if (key) {
        await this.blobStore.delete(key);
      }

      await images.delete(imageId);
      logger.info('Image deleted', { imageId, entryId: image.entryId, hadFile: key !== null });
      return true;
    });
  }
}
