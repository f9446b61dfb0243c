import { config } from 'dotenv';
import { join } from 'path';
import { DataSource } from 'typeorm';
import { postgresOptionsFromEnv } from './postgres-options';

// .env sits at the repo root, two levels up from src/ and three from dist/
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../.env') });

/** Target of `npm run migration:run` / `migration:revert` and the seed. */
const AppDataSource = new DataSource(postgresOptionsFromEnv(process.env));

export default AppDataSource;
