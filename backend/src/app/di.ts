/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Keeps modules testable: tests pass their own db (in-process Postgres) and clock.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { createAccountModule } from '../modules/accounts';
import type { AccountModule } from '../modules/accounts';

export type AppDeps = {
  db: Db;

  // modules
  accounts: AccountModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  clock?: () => Date;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const db = overrides.db ?? createDb(config.databaseUri);
  const clock = overrides.clock ?? (() => new Date());

  // modules (no HTTP / no business logic here)
  const accounts = createAccountModule({ db, clock });

  return {
    db,
    accounts,
    close: async () => {
      await db.destroy();
    },
  };
}
