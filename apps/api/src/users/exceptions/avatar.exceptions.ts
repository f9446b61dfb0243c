import { HttpException, HttpStatus } from '@nestjs/common';

/** Image types accepted as avatars. */
export const ALLOWED_AVATAR_MIME_TYPES = [
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/gif',
] as const;

/**
 * Thrown when the avatar's MIME type is not on the allowlist.
 * Maps to HTTP 415 Unsupported Media Type.
 */
export class InvalidAvatarTypeException extends HttpException {
  constructor(receivedMimeType: string) {
    super(
      {
        statusCode: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
        error: 'Unsupported Media Type',
        message: `File type "${receivedMimeType}" is not supported. Allowed types: ${ALLOWED_AVATAR_MIME_TYPES.join(', ')}`,
      },
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

/**
 * Thrown when no image is attached to the avatar request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingAvatarException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'An image must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the avatar exceeds the configured size limit.
 * Maps to HTTP 413 Content Too Large.
 */
export class AvatarTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `Avatar exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}
