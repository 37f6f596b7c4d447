/**
 * backend/src/modules/accounts/index.ts
 *
 * WHY:
 * - Define the public surface of the accounts module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 */

export { createAccountModule } from './account.module';
export type { AccountModule } from './account.module';
export { ACCOUNTS_PATH, accountLocation } from './account.controller';
export { serializeAccount, deserializeAccount } from './account.codec';
export type { AccountJson, AccountParseResult, FieldComplaint } from './account.codec';
export type { Account, AccountDraft, AccountGateway, AccountId } from './account.types';
