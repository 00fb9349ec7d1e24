import { DomainErrorCode, createDomainServiceError } from '@diary/platform-core';

const DiaryDomainCodes = {
  ENTRY_NOT_FOUND: 'ENTRY_NOT_FOUND',
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  IMAGE_REQUIRED: 'IMAGE_REQUIRED',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  INVALID_FILE_TYPE: 'INVALID_FILE_TYPE',
  ENTRY_REFERENCE_INVALID: 'ENTRY_REFERENCE_INVALID',
  IMAGE_WRITE_FAILED: 'IMAGE_WRITE_FAILED',
} as const;

export const DiaryErrorCode = { ...DomainErrorCode, ...DiaryDomainCodes } as const;
export type DiaryErrorCodeType = (typeof DiaryErrorCode)[keyof typeof DiaryErrorCode];

const DiaryErrorBase = createDomainServiceError('Diary', DiaryErrorCode);

export class DiaryError extends DiaryErrorBase {
  static imageRequired() {
    return new DiaryError('Image file is required', 400, DiaryErrorCode.IMAGE_REQUIRED);
  }

  static fileTooLarge(maxMegabytes: number) {
    return new DiaryError(
      `File size exceeds maximum allowed size of ${maxMegabytes} MB`,
      400,
      DiaryErrorCode.FILE_TOO_LARGE
    );
  }

  static invalidFileType(extension: string, allowed: readonly string[]) {
    return new DiaryError(
      `File type '${extension}' is not allowed. Allowed types: ${allowed.join(', ')}`,
      400,
      DiaryErrorCode.INVALID_FILE_TYPE
    );
  }

  // The entry is referenced by the request, so a missing one is a bad request rather than a 404
  static entryReferenceInvalid(entryId: number) {
    return new DiaryError(`Diary entry with ID ${entryId} not found`, 400, DiaryErrorCode.ENTRY_REFERENCE_INVALID);
  }

  static imageWriteFailed(cause?: Error) {
    return new DiaryError('Failed to save image file', 500, DiaryErrorCode.IMAGE_WRITE_FAILED, cause);
  }
}
