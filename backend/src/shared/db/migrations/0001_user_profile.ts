/**
 * src/shared/db/migrations/0001_user_profile.ts
 *
 * WHY:
 * - Single relation for user accounts.
 * - username + email uniqueness is enforced HERE (unique violation 23505),
 *   never by application checks.
 *
 * RULES:
 * - id is int8 (bigserial); db.ts parses int8 back to a JS number.
 * - Password stored as received (no hashing in this version).
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('user_profile')
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('username', 'text', (col) => col.notNull().unique())
    .addColumn('first_name', 'text', (col) => col.notNull())
    .addColumn('last_name', 'text', (col) => col.notNull())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('password', 'text', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('user_profile').ifExists().execute();
}
