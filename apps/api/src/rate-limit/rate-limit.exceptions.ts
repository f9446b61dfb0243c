import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when a client exceeds the request cap of a route class.
 * Maps to HTTP 429 Too Many Requests.
 */
export class RateLimitExceededException extends HttpException {
  constructor(retryAfterSeconds: number) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'Too Many Requests',
        message: `Too many requests. Please try again in ${retryAfterSeconds} s.`,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
