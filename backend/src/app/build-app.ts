/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> (migrations) -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { migrateToLatest } from '../shared/db/migrator';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  logger.level = config.logLevel;

  const deps = await buildDeps(config, overrides);

  if (config.migrateOnStart) {
    logger.info('db.migrate.start', { flow: 'db.migrate' });
    await migrateToLatest(deps.db);
    logger.info('db.migrate.done', { flow: 'db.migrate' });
  }

  const app = await buildServer({ config });

  registerRoutes(app, { deps });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
