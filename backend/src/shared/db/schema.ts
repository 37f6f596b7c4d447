/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type every query.
 * - Mirrors what the migrations create; update both together.
 *
 * RULES:
 * - snake_case column names stay here and in DAL files only.
 */

import type { Generated } from 'kysely';

export interface AccountsTable {
  id: Generated<number>;
  name: string;
  email: string;
  address: string;
  phone_number: string;
  // ISO date (YYYY-MM-DD); see parsePgDate in db.ts
  date_joined: string;
}

export interface DB {
  accounts: AccountsTable;
}
