import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Contact } from '@contacts/database';
import { ContactsRepository, ContactFields } from './contacts.repository';
import {
  Pagination,
  RawContactFilters,
  normalizeContactFilters,
} from './contact-filters';
import { selectUpcomingBirthdays } from './birthdays';

/**
 * ContactsService — owner-scoped contact operations.
 *
 * Reads run on the data source's default manager; writes run inside
 * `DataSource.transaction()` so the re-fetch and the write share one
 * transaction. Store errors propagate unchanged.
 *
 * Absence is returned as `null` / `[]`; mapping it to 404 is the
 * controller's job.
 */
@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly contactsRepository: ContactsRepository,
  ) {}

  // ── Queries ─────────────────────────────────────────────────

  async listContacts(
    ownerId: number,
    rawFilters: RawContactFilters,
    page: Pagination,
  ): Promise<Contact[]> {
    const filters = normalizeContactFilters(rawFilters);
    this.logger.debug(
      `Listing contacts for user ${ownerId}: filters=${JSON.stringify(filters)}, ` +
        `skip=${page.skip}, limit=${page.limit}`,
    );

    return this.contactsRepository.findMany(
      this.dataSource.manager,
      ownerId,
      filters,
      page,
    );
  }

  /**
   * Contacts on the requested page whose birthday is within the next
   * seven days. The page is fetched first and filtered afterwards.
   */
  async listUpcomingBirthdays(
    ownerId: number,
    page: Pagination,
    today: Date = new Date(),
  ): Promise<Contact[]> {
    const contacts = await this.contactsRepository.findPage(
      this.dataSource.manager,
      ownerId,
      page,
    );
    return selectUpcomingBirthdays(contacts, today);
  }

  getContact(ownerId: number, contactId: number): Promise<Contact | null> {
    return this.contactsRepository.findById(
      this.dataSource.manager,
      ownerId,
      contactId,
    );
  }

  // ── Mutations ───────────────────────────────────────────────

  async createContact(
    ownerId: number,
    fields: ContactFields,
  ): Promise<Contact> {
    const contact = await this.dataSource.transaction((manager) =>
      this.contactsRepository.create(manager, ownerId, fields),
    );

    this.logger.log(`Contact ${contact.id} created for user ${ownerId}`);
    return contact;
  }

  /** Replaces every writable field; returns null when the contact is not the owner's. */
  async updateContact(
    ownerId: number,
    contactId: number,
    fields: ContactFields,
  ): Promise<Contact | null> {
    const contact = await this.dataSource.transaction((manager) =>
      this.contactsRepository.update(manager, ownerId, contactId, fields),
    );

    if (contact) {
      this.logger.log(`Contact ${contactId} updated for user ${ownerId}`);
    }
    return contact;
  }

  async removeContact(
    ownerId: number,
    contactId: number,
  ): Promise<Contact | null> {
    const contact = await this.dataSource.transaction((manager) =>
      this.contactsRepository.remove(manager, ownerId, contactId),
    );

    if (contact) {
      this.logger.log(`Contact ${contactId} removed for user ${ownerId}`);
    }
    return contact;
  }
}
