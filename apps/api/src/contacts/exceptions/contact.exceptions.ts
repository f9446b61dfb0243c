import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when a contact lookup or listing comes back empty for the caller.
 * Contacts owned by other users are reported the same way.
 * Maps to HTTP 404 Not Found.
 */
export class ContactNotFoundException extends HttpException {
  constructor(message = 'Contact with requested id not found') {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message,
      },
      HttpStatus.NOT_FOUND,
    );
  }

  static forListing(): ContactNotFoundException {
    return new ContactNotFoundException(
      'Contacts with requested parameters not found',
    );
  }

  static forBirthdays(): ContactNotFoundException {
    return new ContactNotFoundException(
      'Contacts with birthdays for the next 7 days not found',
    );
  }
}
