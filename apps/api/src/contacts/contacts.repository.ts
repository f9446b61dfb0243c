import { Injectable } from '@nestjs/common';
import { EntityManager, FindOptionsWhere } from 'typeorm';
import { Contact } from '@contacts/database';
import {
  ContactFilters,
  FilterField,
  Pagination,
  activeFilterFields,
  unionContacts,
} from './contact-filters';

/** Writable contact fields; update always replaces all of them. */
export interface ContactFields {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  dateOfBirth: string;
}

/**
 * ContactsRepository — the only code that touches the contacts table.
 *
 * Every method takes the EntityManager to run on, so callers decide the
 * transaction boundary. Every query is scoped by owner id; a contact owned
 * by someone else is indistinguishable from a missing one.
 *
 * Absence is reported as `null` (single rows) or `[]` (lists), never thrown.
 */
@Injectable()
export class ContactsRepository {
  /**
   * Filtered / paginated listing.
   *
   * - no filter: owner's contacts by id, with skip/limit
   * - one filter: exact matches, skip/limit not applied
   * - two or three filters: de-duplicated union of the single-field matches
   */
  async findMany(
    manager: EntityManager,
    ownerId: number,
    filters: ContactFilters,
    page: Pagination,
  ): Promise<Contact[]> {
    const fields = activeFilterFields(filters);

    if (fields.length === 0) {
      return this.findPage(manager, ownerId, page);
    }

    const matches: Contact[][] = [];
    for (const field of fields) {
      const value = filters[field];
      if (value === undefined) continue;
      matches.push(await this.findByField(manager, ownerId, field, value));
    }

    return unionContacts(...matches);
  }

  /** One page of the owner's contacts in store order. */
  findPage(
    manager: EntityManager,
    ownerId: number,
    { skip, limit }: Pagination,
  ): Promise<Contact[]> {
    return manager.find(Contact, {
      where: { userId: ownerId },
      order: { id: 'ASC' },
      skip,
      take: limit,
    });
  }

  findById(
    manager: EntityManager,
    ownerId: number,
    contactId: number,
  ): Promise<Contact | null> {
    return manager.findOne(Contact, {
      where: { id: contactId, userId: ownerId },
    });
  }

  create(
    manager: EntityManager,
    ownerId: number,
    fields: ContactFields,
  ): Promise<Contact> {
    const contact = manager.create(Contact, { ...fields, userId: ownerId });
    return manager.save(Contact, contact);
  }

  async update(
    manager: EntityManager,
    ownerId: number,
    contactId: number,
    fields: ContactFields,
  ): Promise<Contact | null> {
    const contact = await this.findById(manager, ownerId, contactId);
    if (!contact) return null;

    contact.firstName = fields.firstName;
    contact.lastName = fields.lastName;
    contact.email = fields.email;
    contact.phone = fields.phone;
    contact.dateOfBirth = fields.dateOfBirth;

    return manager.save(Contact, contact);
  }

  async remove(
    manager: EntityManager,
    ownerId: number,
    contactId: number,
  ): Promise<Contact | null> {
    const contact = await this.findById(manager, ownerId, contactId);
    if (!contact) return null;

    // remove() strips the primary key from the entity it is given
    const snapshot: Contact = { ...contact };
    await manager.remove(Contact, contact);
    return snapshot;
  }

  // ── Private helpers ──────────────────────────────────────

  private findByField(
    manager: EntityManager,
    ownerId: number,
    field: FilterField,
    value: string,
  ): Promise<Contact[]> {
    const where: FindOptionsWhere<Contact> = { userId: ownerId };
    where[field] = value;

    return manager.find(Contact, { where, order: { id: 'ASC' } });
  }
}
