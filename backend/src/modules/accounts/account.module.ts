/**
 * backend/src/modules/accounts/account.module.ts
 *
 * WHY:
 * - Encapsulates Accounts module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';

import { AccountController } from './account.controller';
import { AccountService } from './account.service';
import { registerAccountRoutes } from './account.routes';
import { createAccountGateway } from './account.gateway';

export type AccountModule = ReturnType<typeof createAccountModule>;

export function createAccountModule(deps: { db: DbExecutor; clock: () => Date }) {
  const accountGateway = createAccountGateway(deps.db);

  const accountService = new AccountService({
    gateway: accountGateway,
    clock: deps.clock,
  });

  const controller = new AccountController(accountService);

  return {
    accountGateway,
    accountService,
    registerRoutes(app: FastifyInstance) {
      registerAccountRoutes(app, controller);
    },
  };
}
