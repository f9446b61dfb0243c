import { ConflictException } from '@nestjs/common';

/**
 * Thrown on signup when the email already belongs to an account.
 * HTTP 409 Conflict.
 */
export class EmailAlreadyExistsException extends ConflictException {
  constructor(email: string) {
    super(
      {
        statusCode: 409,
        error: 'Conflict',
        message: 'Account already exists',
      },
      { description: `Signup attempted for existing email ${email}` },
    );
  }
}
