import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';

/**
 * Contact entity — one address-book entry.
 *
 * Invariants:
 * - Every contact belongs to exactly one user (owner)
 * - Only the owner may read or modify it
 * - date_of_birth is a calendar date; the driver returns it as "YYYY-MM-DD"
 */
@Entity('contacts')
@Index('IDX_contacts_user_first_name', ['userId', 'firstName'])
@Index('IDX_contacts_user_last_name', ['userId', 'lastName'])
@Index('IDX_contacts_user_email', ['userId', 'email'])
export class Contact {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50, name: 'first_name' })
  firstName!: string;

  @Column({ type: 'varchar', length: 50, name: 'last_name' })
  lastName!: string;

  @Column({ type: 'varchar', length: 100 })
  email!: string;

  @Column({ type: 'varchar', length: 20 })
  phone!: string;

  @Column({ type: 'date', name: 'date_of_birth' })
  dateOfBirth!: string;

  @Index('IDX_contacts_user_id')
  @Column({ type: 'integer', name: 'user_id' })
  userId!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.contacts, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  user!: User;
}
