/**
 * src/shared/db/migrations/0001_accounts.ts
 *
 * WHY:
 * - Creates the single `accounts` table backing the Account resource.
 * - Column widths match the payload limits in account.schemas.ts.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('accounts')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar(64)', (col) => col.notNull())
    .addColumn('email', 'varchar(64)', (col) => col.notNull())
    .addColumn('address', 'varchar(256)', (col) => col.notNull())
    .addColumn('phone_number', 'varchar(32)', (col) => col.notNull())
    .addColumn('date_joined', 'date', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('accounts').ifExists().execute();
}
