import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login credentials are invalid (unknown email or wrong
 * password). One message for both cases so accounts cannot be enumerated.
 * HTTP 401 Unauthorized.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid email or password',
    });
  }
}

/**
 * Thrown when the password is correct but the email was never confirmed.
 * HTTP 401 Unauthorized.
 */
export class EmailNotConfirmedException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Email not confirmed',
    });
  }
}
