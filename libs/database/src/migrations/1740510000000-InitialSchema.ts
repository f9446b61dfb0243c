import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration — creates the users and contacts tables.
 *
 * Hand-written to match the TypeORM entity definitions. PostgreSQL-specific
 * (serial keys, timestamp defaults).
 */
export class InitialSchema1740510000000 implements MigrationInterface {
  name = 'InitialSchema1740510000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Users table ────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "username"      varchar(50) NOT NULL,
        "email"         varchar(250) NOT NULL,
        "password"      varchar(255) NOT NULL,
        "avatar"        varchar(255),
        "confirmed"     boolean NOT NULL DEFAULT false,
        "refresh_token" text,
        "created_at"    TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );

    // ── Contacts table ─────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "contacts" (
        "id"            SERIAL NOT NULL,
        "first_name"    varchar(50) NOT NULL,
        "last_name"     varchar(50) NOT NULL,
        "email"         varchar(100) NOT NULL,
        "phone"         varchar(20) NOT NULL,
        "date_of_birth" date NOT NULL,
        "user_id"       integer NOT NULL,
        "created_at"    TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contacts" PRIMARY KEY ("id"),
        CONSTRAINT "FK_contacts_user" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_user_id" ON "contacts" ("user_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_user_first_name" ON "contacts" ("user_id", "first_name")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_user_last_name" ON "contacts" ("user_id", "last_name")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_user_email" ON "contacts" ("user_id", "email")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "contacts"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
