/**
 * backend/src/modules/accounts/account.routes.ts
 *
 * WHY:
 * - Declares Accounts module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import { ACCOUNTS_PATH, type AccountController } from './account.controller';

export function registerAccountRoutes(app: FastifyInstance, controller: AccountController) {
  app.post(ACCOUNTS_PATH, controller.createAccount.bind(controller));
  app.get(ACCOUNTS_PATH, controller.listAccounts.bind(controller));
  app.get(`${ACCOUNTS_PATH}/:accountId`, controller.getAccount.bind(controller));
  app.put(`${ACCOUNTS_PATH}/:accountId`, controller.updateAccount.bind(controller));
  app.delete(`${ACCOUNTS_PATH}/:accountId`, controller.deleteAccount.bind(controller));
}
