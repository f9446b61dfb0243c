import { BadRequestException, UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when a refresh token is malformed, expired, of the wrong scope, or
 * no longer the one stored for the user. HTTP 401 Unauthorized.
 */
export class InvalidRefreshTokenException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid refresh token',
    });
  }
}

/**
 * Thrown when an email confirmation link cannot be verified.
 * HTTP 400 Bad Request.
 */
export class EmailVerificationException extends BadRequestException {
  constructor() {
    super({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Verification error',
    });
  }
}
