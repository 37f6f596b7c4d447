/**
 * backend/src/modules/accounts/account.service.ts
 *
 * WHY:
 * - Orchestrates the Account CRUD flows.
 * - Turns "not found" and "invalid payload" into AccountErrors.
 *
 * RULES:
 * - No raw DB access (AccountGateway only).
 * - No HTTP concerns (status codes live in the controller).
 * - Each operation is one read, or one write that commits before returning.
 */

import type { Account, AccountGateway, AccountId } from './account.types';
import { deserializeAccount, toIsoDate } from './account.codec';
import { AccountErrors } from './account.errors';

export class AccountService {
  constructor(
    private readonly deps: {
      gateway: AccountGateway;
      clock: () => Date;
    },
  ) {}

  async createAccount(payload: unknown): Promise<Account> {
    const parsed = deserializeAccount(payload, { dateJoined: toIsoDate(this.deps.clock()) });
    if (!parsed.ok) {
      throw AccountErrors.invalidAccount(parsed.complaints, { flow: 'accounts.create' });
    }

    return this.deps.gateway.insert(parsed.draft);
  }

  async getAccount(accountId: AccountId): Promise<Account> {
    const account = await this.deps.gateway.findById(accountId);
    if (!account) throw AccountErrors.accountNotFound(accountId, { flow: 'accounts.read' });
    return account;
  }

  async listAccounts(): Promise<Account[]> {
    return this.deps.gateway.listAll();
  }

  /**
   * Full replace. An unknown id wins over an invalid payload (404 before 400).
   * A payload without date_joined keeps the stored one.
   */
  async updateAccount(accountId: AccountId, payload: unknown): Promise<Account> {
    const existing = await this.deps.gateway.findById(accountId);
    if (!existing) throw AccountErrors.accountNotFound(accountId, { flow: 'accounts.update' });

    const parsed = deserializeAccount(payload, { dateJoined: existing.dateJoined });
    if (!parsed.ok) {
      throw AccountErrors.invalidAccount(parsed.complaints, { flow: 'accounts.update', accountId });
    }

    const updated = await this.deps.gateway.update({ ...parsed.draft, id: existing.id });
    if (!updated) throw AccountErrors.accountNotFound(accountId, { flow: 'accounts.update' });
    return updated;
  }

  /**
   * Idempotent: deleting an unknown id succeeds. Returns whether a row went away.
   */
  async deleteAccount(accountId: AccountId): Promise<boolean> {
    return this.deps.gateway.delete(accountId);
  }
}
