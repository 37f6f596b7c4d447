/**
 * backend/src/modules/accounts/dal/account.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for accounts (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { AccountsTable } from '../../../shared/db/schema';

export type AccountRow = Selectable<AccountsTable>;

export async function selectAccountByIdSql(
  db: DbExecutor,
  accountId: number,
): Promise<AccountRow | undefined> {
  return db.selectFrom('accounts').selectAll().where('id', '=', accountId).executeTakeFirst();
}

export async function selectAllAccountsSql(db: DbExecutor): Promise<AccountRow[]> {
  return db.selectFrom('accounts').selectAll().orderBy('id', 'asc').execute();
}
