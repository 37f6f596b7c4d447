/**
 * backend/src/modules/accounts/dal/account.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for accounts (mutations).
 * - Every write is a single statement, committed when it returns.
 *
 * RULES:
 * - No AppError.
 */

import type { Insertable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { AccountsTable } from '../../../shared/db/schema';
import type { AccountRow } from './account.query-sql';

export type AccountValues = Omit<Insertable<AccountsTable>, 'id'>;

export class AccountRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertAccount(values: AccountValues): Promise<AccountRow> {
    return this.db
      .insertInto('accounts')
      .values(values)
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Replaces every column of the row. Returns undefined when the id does not exist.
   */
  async updateAccount(accountId: number, values: AccountValues): Promise<AccountRow | undefined> {
    return this.db
      .updateTable('accounts')
      .set(values)
      .where('id', '=', accountId)
      .returningAll()
      .executeTakeFirst();
  }

  /**
   * Returns the number of rows removed (0 when the id does not exist).
   */
  async deleteAccount(accountId: number): Promise<number> {
    const result = await this.db
      .deleteFrom('accounts')
      .where('id', '=', accountId)
      .executeTakeFirst();

    return Number(result.numDeletedRows);
  }
}
