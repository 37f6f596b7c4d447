/**
 * backend/src/modules/accounts/account.gateway.ts
 *
 * WHY:
 * - The relational AccountGateway: one object exposing reads (queries) and
 *   writes (repo) so the service depends on a single interface.
 *
 * RULES:
 * - Translation between domain (camelCase) and columns (snake_case) only.
 */

import type { DbExecutor } from '../../shared/db/db';
import { AccountRepo, type AccountValues } from './dal/account.repo';
import { getAccountById, listAccounts, toAccount } from './queries/account.queries';
import type { AccountDraft, AccountGateway } from './account.types';

function toValues(draft: AccountDraft): AccountValues {
  return {
    name: draft.name,
    email: draft.email,
    address: draft.address,
    phone_number: draft.phoneNumber,
    date_joined: draft.dateJoined,
  };
}

export function createAccountGateway(db: DbExecutor, repo = new AccountRepo(db)): AccountGateway {
  return {
    async insert(draft) {
      return toAccount(await repo.insertAccount(toValues(draft)));
    },

    findById(id) {
      return getAccountById(db, id);
    },

    async update(account) {
      const row = await repo.updateAccount(account.id, toValues(account));
      return row ? toAccount(row) : undefined;
    },

    async delete(id) {
      return (await repo.deleteAccount(id)) > 0;
    },

    listAll() {
      return listAccounts(db);
    },
  };
}
