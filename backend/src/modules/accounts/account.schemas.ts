/**
 * backend/src/modules/accounts/account.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Accounts module.
 * - Prevents invalid payloads from reaching the gateway.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Field limits match the column widths in migrations/0001_accounts.ts and,
 *   like varchar(n), count characters (code points), not UTF-16 units.
 * - Unknown keys are stripped, never rejected.
 */

import { z } from 'zod';

export const ACCOUNT_FIELD_LIMITS = {
  name: 64,
  email: 64,
  address: 256,
  phone_number: 32,
} as const;

function requiredText(maxLength: number) {
  return z
    .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
    .refine((value) => [...value].length <= maxLength, `must be at most ${maxLength} characters`);
}

const isoDate = z.string().date();

// Postgres DATE has no year 0.
function isStorableDate(value: string): boolean {
  return isoDate.safeParse(value).success && !value.startsWith('0000-');
}

export const accountPayloadSchema = z.object(
  {
    name: requiredText(ACCOUNT_FIELD_LIMITS.name),
    email: requiredText(ACCOUNT_FIELD_LIMITS.email),
    address: requiredText(ACCOUNT_FIELD_LIMITS.address),
    phone_number: requiredText(ACCOUNT_FIELD_LIMITS.phone_number),
    date_joined: z
      .string({ invalid_type_error: 'must be a string' })
      .refine(isStorableDate, 'must be an ISO date (YYYY-MM-DD)')
      .nullish(),
  },
  {
    required_error: 'request body must be a JSON object',
    invalid_type_error: 'request body must be a JSON object',
  },
);

// Postgres SERIAL is a signed 32-bit integer.
const MAX_ACCOUNT_ID = 2_147_483_647;

export const accountParamsSchema = z.object({
  accountId: z
    .string()
    .regex(/^[1-9]\d{0,9}$/)
    .transform(Number)
    .refine((id) => id <= MAX_ACCOUNT_ID),
});
