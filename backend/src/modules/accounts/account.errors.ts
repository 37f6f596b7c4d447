/**
 * backend/src/modules/accounts/account.errors.ts
 *
 * WHY:
 * - Accounts module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import { describeComplaints, type FieldComplaint } from './account.codec';

export const AccountErrors = {
  accountNotFound(accountId: number | string, meta?: AppErrorMeta) {
    return AppError.notFound(`Account with id [${accountId}] could not be found.`, {
      accountId,
      ...meta,
    });
  },

  invalidAccount(complaints: FieldComplaint[], meta?: AppErrorMeta) {
    return AppError.validationError(`Invalid Account: ${describeComplaints(complaints)}`, {
      complaints,
      ...meta,
    });
  },
} as const;
