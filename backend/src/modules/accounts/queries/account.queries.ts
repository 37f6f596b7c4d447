/**
 * backend/src/modules/accounts/queries/account.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Account domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectAccountByIdSql, selectAllAccountsSql } from '../dal/account.query-sql';
import type { AccountRow } from '../dal/account.query-sql';
import type { Account } from '../account.types';

export function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    address: row.address,
    phoneNumber: row.phone_number,
    dateJoined: row.date_joined,
  };
}

export async function getAccountById(
  db: DbExecutor,
  accountId: number,
): Promise<Account | undefined> {
  const row = await selectAccountByIdSql(db, accountId);
  if (!row) return undefined;
  return toAccount(row);
}

export async function listAccounts(db: DbExecutor): Promise<Account[]> {
  const rows = await selectAllAccountsSql(db);
  return rows.map(toAccount);
}
