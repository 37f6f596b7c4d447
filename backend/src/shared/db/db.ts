/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema.ts next to the migrations that create them.
 *
 * HOW TO USE:
 * - DI calls createDb(config.databaseUri) once at startup.
 * - Tests build a Kysely<DB> over an in-process Postgres (PGlite) instead;
 *   they parse DATE with the same parsePgDate.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export const PG_DATE_OID = 1082;

/** DATE stays the ISO string Postgres sends (pg would build a local-midnight Date). */
export function parsePgDate(value: string): string {
  return value;
}

pg.types.setTypeParser(PG_DATE_OID, parsePgDate);

export function createDb(databaseUri: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUri,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
