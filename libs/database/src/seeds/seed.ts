import { Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import AppDataSource from '../data-source';
import { User } from '../entities/user.entity';
import { Contact } from '../entities/contact.entity';
import { seedBirthDate } from './birth-date';

/**
 * Seed script — populates the database with demo data.
 *
 * Usage:
 *   npm run seed
 *
 * Prerequisites:
 *   - PostgreSQL is running
 *   - Migrations have been applied (npm run migration:run)
 *
 * Idempotent: truncates both tables before inserting.
 * All demo accounts are confirmed and use the password "password123".
 */
const DEMO_PASSWORD = 'password123';

interface SeedUser {
  username: string;
  email: string;
}

interface SeedContact {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  /** Birthday offset from today, in days; the year is pushed back to keep ages plausible */
  birthdayInDays: number;
  birthYear: number;
}

const USERS: SeedUser[] = [
  { username: 'alice', email: 'alice@contacts.test' },
  { username: 'bob', email: 'bob@contacts.test' },
];

const CONTACTS: SeedContact[][] = [
  [
    {
      firstName: 'Maria',
      lastName: 'Lopez',
      email: 'maria.lopez@example.com',
      phone: '+15550100001',
      birthdayInDays: 2,
      birthYear: 1988,
    },
    {
      firstName: 'Tom',
      lastName: 'Reed',
      email: 'tom.reed@example.com',
      phone: '+15550100002',
      birthdayInDays: 40,
      birthYear: 1975,
    },
    {
      firstName: 'Maria',
      lastName: 'Chen',
      email: 'maria.chen@example.com',
      phone: '+15550100003',
      birthdayInDays: 6,
      birthYear: 2001,
    },
  ],
  [
    {
      firstName: 'Ivan',
      lastName: 'Petrov',
      email: 'ivan.petrov@example.com',
      phone: '+15550100004',
      birthdayInDays: 0,
      birthYear: 1992,
    },
  ],
];

async function seed(): Promise<void> {
  const logger = new Logger('Seed');

  logger.log('Initializing data source...');
  await AppDataSource.initialize();

  const queryRunner = AppDataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction();

  try {
    logger.log('Truncating tables...');
    await queryRunner.query('TRUNCATE TABLE contacts, users RESTART IDENTITY CASCADE');

    // ── Insert Users ───────────────────────────────────────
    const password = await bcrypt.hash(DEMO_PASSWORD, 10);
    const userRepo = queryRunner.manager.getRepository(User);
    const savedUsers = await userRepo.save(
      USERS.map((u) => userRepo.create({ ...u, password, confirmed: true })),
    );
    logger.log(`✓ Inserted ${savedUsers.length} users`);

    // ── Insert Contacts ────────────────────────────────────
    const contactRepo = queryRunner.manager.getRepository(Contact);
    let contactCount = 0;
    for (const [index, owner] of savedUsers.entries()) {
      const rows = (CONTACTS[index] ?? []).map((c) =>
        contactRepo.create({
          firstName: c.firstName,
          lastName: c.lastName,
          email: c.email,
          phone: c.phone,
          dateOfBirth: seedBirthDate(c.birthdayInDays, c.birthYear),
          userId: owner.id,
        }),
      );
      await contactRepo.save(rows);
      contactCount += rows.length;
    }
    logger.log(`✓ Inserted ${contactCount} contacts`);

    await queryRunner.commitTransaction();
    logger.log('─────────────────────────────────────────');
    logger.log('✅ Seed completed successfully!');
    logger.log(`   Users:    ${savedUsers.length}`);
    logger.log(`   Contacts: ${contactCount}`);
  } catch (error) {
    logger.error('Seed failed, rolling back transaction...');
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
    await AppDataSource.destroy();
  }
}

seed().catch((error: Error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal seed error:', error.message);
  process.exit(1);
});
