/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations against the configured Postgres from the command line.
 *
 * HOW TO USE:
 * - npm run db:migrate          (apply pending migrations)
 * - npm run db:reset            (drop everything, re-create the schema)
 */

import 'dotenv/config';

import { createDb } from './db';
import { migrateToLatest, resetDatabase } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUri);
  const command = process.argv[2] ?? 'latest';

  try {
    if (command === 'reset') {
      await resetDatabase(db);
      logger.info('Database reset');
    } else if (command === 'latest') {
      await migrateToLatest(db);
      logger.info('Migrations up to date');
    } else {
      throw new Error(`Unknown migrate command: ${command} (expected "latest" or "reset")`);
    }
  } finally {
    await db.destroy();
  }
}

void main().catch((err: unknown) => {
  logger.error('Migration failed', { err });
  process.exit(1);
});
