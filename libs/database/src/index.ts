// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Contact } from './entities/contact.entity';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
