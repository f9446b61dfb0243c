import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Contact } from './contact.entity';

/**
 * User entity — an account that owns a private address book.
 *
 * Invariants:
 * - Email must be unique across all users
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Login is refused until `confirmed` has been set by the email flow
 * - Deleting a user cascades to all their contacts
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  username!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 250 })
  email!: string;

  @Column({ type: 'varchar', length: 255 })
  password!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  avatar!: string | null;

  @Column({ type: 'boolean', default: false })
  confirmed!: boolean;

  // JWT embeds the email, so its length follows the email's
  @Column({ type: 'text', name: 'refresh_token', nullable: true })
  refreshToken!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Contact, (contact) => contact.user, { cascade: false })
  contacts!: Contact[];
}
