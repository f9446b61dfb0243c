import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when an avatar upload to the object store fails.
 *
 * Maps to HTTP 502 Bad Gateway: the failure is in the upstream storage
 * service, not in the client's request.
 */
export class StorageUploadException extends HttpException {
  constructor(objectKey: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'Bad Gateway',
        message: `Failed to store "${objectKey}" in object storage`,
      },
      HttpStatus.BAD_GATEWAY,
      { cause },
    );
  }
}
