import { join } from 'path';
import type { DataSourceOptions } from 'typeorm';
import { DatabaseModule } from './database.module';

function port(raw: string | undefined): number {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 5432;
}

/**
 * Postgres options for the migration CLI and the seed script.
 * Unset variables fall back to the values in .env.example.
 */
export function postgresOptionsFromEnv(env: NodeJS.ProcessEnv): DataSourceOptions {
  return {
    type: 'postgres',
    host: env['POSTGRES_HOST'] || 'localhost',
    port: port(env['POSTGRES_PORT']),
    username: env['POSTGRES_USER'] || 'contacts',
    password: env['POSTGRES_PASSWORD'] || 'contacts_secret',
    database: env['POSTGRES_DB'] || 'contacts',
    entities: [...DatabaseModule.entities],
    migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
    synchronize: false,
    logging: env['NODE_ENV'] !== 'production',
  };
}
