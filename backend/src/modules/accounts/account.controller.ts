/**
 * backend/src/modules/accounts/account.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates path params / content type and shapes the response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Log request receipt and outcome for every handler.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { assertJsonContentType } from '../../shared/http/content-type';
import { withRequestContext } from '../../shared/logger/with-context';
import { accountParamsSchema } from './account.schemas';
import { serializeAccount } from './account.codec';
import { AccountErrors } from './account.errors';
import type { AccountService } from './account.service';

export const ACCOUNTS_PATH = '/accounts';

export function accountLocation(accountId: number): string {
  return `${ACCOUNTS_PATH}/${accountId}`;
}

/**
 * A path id that is not a positive integer cannot name an account: 404.
 */
function parseAccountId(req: FastifyRequest): number {
  const params = req.params;
  const parsed = accountParamsSchema.safeParse(params);
  if (!parsed.success) {
    const raw =
      typeof params === 'object' && params !== null && 'accountId' in params
        ? String(params.accountId)
        : '';
    throw AccountErrors.accountNotFound(raw);
  }
  return parsed.data.accountId;
}

export class AccountController {
  constructor(private readonly accountService: AccountService) {}

  async createAccount(req: FastifyRequest, reply: FastifyReply) {
    const log = withRequestContext(req);
    log.info('accounts.create.start', { flow: 'accounts.create' });

    assertJsonContentType(req);
    const account = await this.accountService.createAccount(req.body);

    log.info('accounts.create.done', { flow: 'accounts.create', accountId: account.id });

    return reply
      .status(201)
      .header('location', accountLocation(account.id))
      .send(serializeAccount(account));
  }

  async listAccounts(req: FastifyRequest, reply: FastifyReply) {
    const log = withRequestContext(req);
    log.info('accounts.list.start', { flow: 'accounts.list' });

    const accounts = await this.accountService.listAccounts();

    log.info('accounts.list.done', { flow: 'accounts.list', count: accounts.length });

    return reply.status(200).send(accounts.map(serializeAccount));
  }

  async getAccount(req: FastifyRequest, reply: FastifyReply) {
    const log = withRequestContext(req);
    const accountId = parseAccountId(req);
    log.info('accounts.read.start', { flow: 'accounts.read', accountId });

    const account = await this.accountService.getAccount(accountId);

    log.info('accounts.read.done', { flow: 'accounts.read', accountId });

    return reply.status(200).send(serializeAccount(account));
  }

  async updateAccount(req: FastifyRequest, reply: FastifyReply) {
    const log = withRequestContext(req);
    const accountId = parseAccountId(req);
    log.info('accounts.update.start', { flow: 'accounts.update', accountId });

    assertJsonContentType(req);
    const account = await this.accountService.updateAccount(accountId, req.body);

    log.info('accounts.update.done', { flow: 'accounts.update', accountId });

    return reply.status(200).send(serializeAccount(account));
  }

  async deleteAccount(req: FastifyRequest, reply: FastifyReply) {
    const log = withRequestContext(req);
    const accountId = parseAccountId(req);
    log.info('accounts.delete.start', { flow: 'accounts.delete', accountId });

    const deleted = await this.accountService.deleteAccount(accountId);

    log.info('accounts.delete.done', { flow: 'accounts.delete', accountId, deleted });

    return reply.status(204).send();
  }
}
