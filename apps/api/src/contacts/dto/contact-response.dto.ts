import { Contact } from '@contacts/database';

/**
 * Public contact representation. The owner reference is not exposed.
 */
export class ContactResponseDto {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  dateOfBirth: string;
  createdAt: Date;
  updatedAt: Date;

  private constructor(contact: Contact) {
    this.id = contact.id;
    this.firstName = contact.firstName;
    this.lastName = contact.lastName;
    this.email = contact.email;
    this.phone = contact.phone;
    this.dateOfBirth = contact.dateOfBirth;
    this.createdAt = contact.createdAt;
    this.updatedAt = contact.updatedAt;
  }

  static fromEntity(contact: Contact): ContactResponseDto {
    return new ContactResponseDto(contact);
  }
}
