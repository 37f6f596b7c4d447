/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One Migrator setup shared by the CLI (migrate.ts), app startup and tests.
 * - Migrations are listed statically so they load the same way under tsx,
 *   Vitest and any bundler (no readdir + dynamic import).
 *
 * HOW TO ADD A MIGRATION:
 * - Create migrations/000N_<name>.ts exporting up()/down().
 * - Register it in MIGRATIONS below, in order.
 */

import { Migrator, NO_MIGRATIONS } from 'kysely';
import type { Kysely, Migration, MigrationProvider, MigrationResultSet } from 'kysely';

import { logger } from '../logger/logger';
import * as accounts0001 from './migrations/0001_accounts';

const MIGRATIONS: ReadonlyArray<readonly [string, Migration]> = [
  ['0001_accounts', accounts0001],
];

const migrationProvider: MigrationProvider = {
  async getMigrations() {
    return Object.fromEntries(MIGRATIONS);
  },
};

function buildMigrator<DB>(db: Kysely<DB>): Migrator {
  return new Migrator({ db, provider: migrationProvider });
}

function reportResults(flow: string, { error, results }: MigrationResultSet): void {
  results?.forEach((r) => {
    if (r.status === 'Success') {
      logger.info('migration.success', { flow, migration: r.migrationName, direction: r.direction });
    }
    if (r.status === 'Error') {
      logger.error('migration.error', { flow, migration: r.migrationName, direction: r.direction });
    }
  });

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }
}

export async function migrateToLatest<DB>(db: Kysely<DB>): Promise<void> {
  const resultSet = await buildMigrator(db).migrateToLatest();
  reportResults('db.migrate', resultSet);
}

/** Rolls every migration back, then re-applies them (empty, current schema). */
export async function resetDatabase<DB>(db: Kysely<DB>): Promise<void> {
  const migrator = buildMigrator(db);

  reportResults('db.reset.down', await migrator.migrateTo(NO_MIGRATIONS));
  reportResults('db.reset.up', await migrator.migrateToLatest());
}
