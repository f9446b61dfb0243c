import { DataSource } from 'typeorm';
import { User } from '../entities/user.entity';
import { Contact } from '../entities/contact.entity';

/**
 * In-memory SQLite (sql.js, WebAssembly) data source built from the
 * production entities.
 *
 * Used by store-backed tests in place of PostgreSQL. Every call returns a
 * fresh, isolated database with the schema synchronized from the entities.
 * SQLite does not enforce varchar lengths; column types are asserted
 * against entity metadata instead.
 */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'sqljs',
    autoSave: false,
    entities: [User, Contact],
    synchronize: true,
    logging: false,
  });

  return dataSource.initialize();
}
