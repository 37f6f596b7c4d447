/**
 * backend/src/modules/accounts/account.codec.ts
 *
 * WHY:
 * - Owns the Account wire format (snake_case JSON) in both directions.
 * - Deserialization returns a tagged result instead of throwing, so callers
 *   decide how a bad payload surfaces (HTTP 400 in the service).
 *
 * RULES:
 * - No DB access, no AppError.
 * - `id` in a payload is ignored: ids come from the store.
 */

import type { ZodIssue } from 'zod';
import { accountPayloadSchema } from './account.schemas';
import type { Account, AccountDraft } from './account.types';

export type AccountJson = {
  id: number;
  name: string;
  email: string;
  address: string;
  phone_number: string;
  date_joined: string;
};

export type FieldComplaint = {
  /** Wire name of the offending field; empty when the body itself is wrong. */
  field: string;
  message: string;
};

export type AccountParseResult =
  | { ok: true; draft: AccountDraft }
  | { ok: false; complaints: FieldComplaint[] };

export function serializeAccount(account: Account): AccountJson {
  return {
    id: account.id,
    name: account.name,
    email: account.email,
    address: account.address,
    phone_number: account.phoneNumber,
    date_joined: account.dateJoined,
  };
}

function toComplaint(issue: ZodIssue): FieldComplaint {
  return { field: issue.path.join('.'), message: issue.message };
}

/**
 * Builds an AccountDraft from client JSON.
 * `defaults.dateJoined` is used when the payload has no (or a null) date_joined.
 */
export function deserializeAccount(
  payload: unknown,
  defaults: { dateJoined: string },
): AccountParseResult {
  const parsed = accountPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, complaints: parsed.error.issues.map(toComplaint) };
  }

  const data = parsed.data;
  return {
    ok: true,
    draft: {
      name: data.name,
      email: data.email,
      address: data.address,
      phoneNumber: data.phone_number,
      dateJoined: data.date_joined ?? defaults.dateJoined,
    },
  };
}

export function describeComplaints(complaints: FieldComplaint[]): string {
  return complaints.map((c) => (c.field ? `${c.field} ${c.message}` : c.message)).join('; ');
}

/** UTC calendar date of `now` as YYYY-MM-DD. */
export function toIsoDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}
