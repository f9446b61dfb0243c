import { DataSource } from 'typeorm';
import { User } from '@contacts/database';
import { createTestDataSource } from '@contacts/database/testing/test-data-source';
import { ContactsService } from '../contacts.service';
import { ContactsRepository, ContactFields } from '../contacts.repository';

const NO_FILTERS = {};
const FIRST_PAGE = { skip: 0, limit: 10 };

function fields(overrides: Partial<ContactFields> = {}): ContactFields {
  return {
    firstName: 'Ann',
    lastName: 'Lee',
    email: 'ann.lee@example.com',
    phone: '555-0101',
    dateOfBirth: '1990-05-12',
    ...overrides,
  };
}

describe('ContactsService', () => {
  let dataSource: DataSource;
  let service: ContactsService;
  let owner: User;
  let stranger: User;

  async function createUser(username: string): Promise<User> {
    return dataSource.getRepository(User).save({
      username,
      email: `${username}@example.com`,
      password: 'not-a-real-hash',
      avatar: null,
      confirmed: true,
      refreshToken: null,
    });
  }

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    service = new ContactsService(dataSource, new ContactsRepository());
    owner = await createUser('owner');
    stranger = await createUser('stranger');
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('createContact / getContact', () => {
    it('stores every field and returns them on read', async () => {
      const created = await service.createContact(owner.id, fields());

      const found = await service.getContact(owner.id, created.id);

      expect(found).not.toBeNull();
      expect(found).toMatchObject({
        id: created.id,
        firstName: 'Ann',
        lastName: 'Lee',
        email: 'ann.lee@example.com',
        phone: '555-0101',
        dateOfBirth: '1990-05-12',
        userId: owner.id,
      });
    });

    it('does not return another user’s contact', async () => {
      const created = await service.createContact(owner.id, fields());

      await expect(service.getContact(stranger.id, created.id)).resolves.toBeNull();
    });

    it('returns null for an unknown id', async () => {
      await expect(service.getContact(owner.id, 999)).resolves.toBeNull();
    });
  });

  describe('listContacts', () => {
    it('pages through the owner’s contacts in id order', async () => {
      for (const name of ['A', 'B', 'C', 'D', 'E']) {
        await service.createContact(owner.id, fields({ firstName: name }));
      }
      await service.createContact(stranger.id, fields({ firstName: 'X' }));

      const page = await service.listContacts(owner.id, NO_FILTERS, {
        skip: 1,
        limit: 2,
      });

      expect(page.map((row) => row.firstName)).toEqual(['B', 'C']);
    });

    it('returns nothing when skip is past the end', async () => {
      await service.createContact(owner.id, fields());

      const page = await service.listContacts(owner.id, NO_FILTERS, {
        skip: 5,
        limit: 10,
      });

      expect(page).toEqual([]);
    });

    it('does not paginate a single filter', async () => {
      for (const firstName of ['A', 'B', 'C']) {
        await service.createContact(
          owner.id,
          fields({ firstName, lastName: 'Smith' }),
        );
      }

      const rows = await service.listContacts(
        owner.id,
        { lastName: 'Smith' },
        { skip: 0, limit: 1 },
      );

      expect(rows.map((row) => row.firstName)).toEqual(['A', 'B', 'C']);
    });

    it('matches exactly, not by substring', async () => {
      await service.createContact(owner.id, fields({ firstName: 'Ann' }));
      await service.createContact(owner.id, fields({ firstName: 'Anna' }));

      const rows = await service.listContacts(
        owner.id,
        { firstName: 'Ann' },
        FIRST_PAGE,
      );

      expect(rows.map((row) => row.firstName)).toEqual(['Ann']);
    });

    it('unions several filters without duplicates', async () => {
      const ann = await service.createContact(
        owner.id,
        fields({ firstName: 'Ann', lastName: 'Lee', email: 'ann@example.com' }),
      );
      const bob = await service.createContact(
        owner.id,
        fields({ firstName: 'Bob', lastName: 'Ray', email: 'bob@example.com' }),
      );
      const cy = await service.createContact(
        owner.id,
        fields({ firstName: 'Cy', lastName: 'Lee', email: 'cy@example.com' }),
      );

      const rows = await service.listContacts(
        owner.id,
        { firstName: 'Bob', lastName: 'Lee', email: 'ann@example.com' },
        FIRST_PAGE,
      );

      expect(rows.map((row) => row.id)).toEqual([bob.id, ann.id, cy.id]);
    });

    it('unions two filters and ignores skip/limit', async () => {
      const ann = await service.createContact(
        owner.id,
        fields({ firstName: 'Ann', lastName: 'Moss', email: 'ann@example.com' }),
      );
      const bob = await service.createContact(
        owner.id,
        fields({ firstName: 'Bob', lastName: 'Ray', email: 'bob@example.com' }),
      );
      await service.createContact(
        owner.id,
        fields({ firstName: 'Cy', lastName: 'Ray', email: 'cy@example.com' }),
      );

      const rows = await service.listContacts(
        owner.id,
        { lastName: 'Moss', email: 'bob@example.com' },
        { skip: 5, limit: 1 },
      );

      expect(rows.map((row) => row.id)).toEqual([ann.id, bob.id]);
    });

    it('treats an empty filter value as no filter', async () => {
      await service.createContact(owner.id, fields({ firstName: 'A' }));
      await service.createContact(owner.id, fields({ firstName: 'B' }));

      const rows = await service.listContacts(
        owner.id,
        { firstName: '' },
        { skip: 0, limit: 1 },
      );

      expect(rows.map((row) => row.firstName)).toEqual(['A']);
    });

    it('never matches another user’s contacts', async () => {
      await service.createContact(stranger.id, fields({ lastName: 'Lee' }));

      const rows = await service.listContacts(
        owner.id,
        { lastName: 'Lee' },
        FIRST_PAGE,
      );

      expect(rows).toEqual([]);
    });
  });

  describe('listUpcomingBirthdays', () => {
    it('filters the requested page by the seven-day window', async () => {
      await service.createContact(owner.id, fields({ firstName: 'Soon', dateOfBirth: '1990-05-07' }));
      await service.createContact(owner.id, fields({ firstName: 'Later', dateOfBirth: '1990-06-01' }));
      await service.createContact(owner.id, fields({ firstName: 'Past', dateOfBirth: '1990-04-30' }));

      const rows = await service.listUpcomingBirthdays(
        owner.id,
        FIRST_PAGE,
        new Date(2024, 4, 5),
      );

      expect(rows.map((row) => row.firstName)).toEqual(['Soon']);
    });

    it('never includes another user’s upcoming birthdays', async () => {
      await service.createContact(stranger.id, fields({ firstName: 'Theirs', dateOfBirth: '1990-05-06' }));
      await service.createContact(owner.id, fields({ firstName: 'Mine', dateOfBirth: '1990-05-07' }));

      const rows = await service.listUpcomingBirthdays(
        owner.id,
        FIRST_PAGE,
        new Date(2024, 4, 5),
      );

      expect(rows.map((row) => row.firstName)).toEqual(['Mine']);
    });

    it('reads back a Feb 29 birth date unchanged', async () => {
      const created = await service.createContact(owner.id, fields({ dateOfBirth: '2000-02-29' }));

      await expect(service.getContact(owner.id, created.id)).resolves.toMatchObject({
        dateOfBirth: '2000-02-29',
      });
    });

    it('only looks at the requested page', async () => {
      await service.createContact(owner.id, fields({ firstName: 'Later', dateOfBirth: '1990-06-01' }));
      await service.createContact(owner.id, fields({ firstName: 'Soon', dateOfBirth: '1990-05-07' }));

      const rows = await service.listUpcomingBirthdays(
        owner.id,
        { skip: 0, limit: 1 },
        new Date(2024, 4, 5),
      );

      expect(rows).toEqual([]);
    });
  });

  describe('updateContact', () => {
    it('replaces every field', async () => {
      const created = await service.createContact(owner.id, fields());

      const updated = await service.updateContact(
        owner.id,
        created.id,
        fields({
          firstName: 'Anne',
          lastName: 'Park',
          email: 'anne.park@example.com',
          phone: '555-0199',
          dateOfBirth: '1991-01-02',
        }),
      );

      expect(updated).toMatchObject({
        id: created.id,
        firstName: 'Anne',
        lastName: 'Park',
        email: 'anne.park@example.com',
        phone: '555-0199',
        dateOfBirth: '1991-01-02',
      });
      await expect(service.getContact(owner.id, created.id)).resolves.toMatchObject({
        firstName: 'Anne',
        dateOfBirth: '1991-01-02',
      });
    });

    it('returns null and changes nothing for another user’s contact', async () => {
      const created = await service.createContact(owner.id, fields());

      const result = await service.updateContact(
        stranger.id,
        created.id,
        fields({ firstName: 'Mallory' }),
      );

      expect(result).toBeNull();
      await expect(service.getContact(owner.id, created.id)).resolves.toMatchObject({
        firstName: 'Ann',
      });
    });
  });

  describe('removeContact', () => {
    it('returns the deleted contact and removes it', async () => {
      const created = await service.createContact(owner.id, fields());

      const removed = await service.removeContact(owner.id, created.id);

      expect(removed).toMatchObject({ id: created.id, firstName: 'Ann' });
      await expect(service.getContact(owner.id, created.id)).resolves.toBeNull();
    });

    it('returns null for another user’s contact and keeps it', async () => {
      const created = await service.createContact(owner.id, fields());

      await expect(service.removeContact(stranger.id, created.id)).resolves.toBeNull();
      await expect(service.getContact(owner.id, created.id)).resolves.not.toBeNull();
    });

    it('returns null when removing twice', async () => {
      const created = await service.createContact(owner.id, fields());
      await service.removeContact(owner.id, created.id);

      await expect(service.removeContact(owner.id, created.id)).resolves.toBeNull();
    });
  });
});
