import path from 'path';

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

// Probe order when looking an image's blob up by id
export const ALLOWED_IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp'] as const;

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export function maxImageMegabytes(): number {
  return MAX_IMAGE_BYTES / (1024 * 1024);
}

export function imageExtensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function isAllowedImageExtension(extension: string): boolean {
  return ALLOWED_IMAGE_EXTENSIONS.some(allowed => allowed === extension);
}

export function contentTypeFor(extension: string): string {
  return CONTENT_TYPES[extension.toLowerCase()] ?? 'application/octet-stream';
}

export function blobKey(imageId: number, extension: string): string {
  return `${imageId}${extension}`;
}
