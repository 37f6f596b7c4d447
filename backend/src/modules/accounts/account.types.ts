/**
 * backend/src/modules/accounts/account.types.ts
 *
 * WHY:
 * - Domain types for the Accounts module.
 * - AccountGateway is the only persistence capability the service sees.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 *   The wire format (also snake_case) lives in account.codec.ts.
 */

export type AccountId = number;

export type Account = {
  id: AccountId;
  name: string;
  email: string;
  address: string;
  phoneNumber: string;
  /** ISO date, YYYY-MM-DD */
  dateJoined: string;
};

/** An account that has not been stored yet (no id). */
export type AccountDraft = Omit<Account, 'id'>;

export interface AccountGateway {
  /** Stores a new row and returns it with its generated id. */
  insert(draft: AccountDraft): Promise<Account>;
  findById(id: AccountId): Promise<Account | undefined>;
  /** Overwrites every field; undefined when no row has `account.id`. */
  update(account: Account): Promise<Account | undefined>;
  /** True when a row was removed; a missing id is not an error. */
  delete(id: AccountId): Promise<boolean>;
  /** Every account, ordered by id. */
  listAll(): Promise<Account[]>;
}
