import { describe, it, expect, vi } from 'vitest';
import { AccountService } from '../../../src/modules/accounts/account.service';
import { AppError } from '../../../src/shared/http/errors';
import { InMemoryAccountGateway } from '../../helpers/in-memory-account-gateway';

const NOW = new Date('2026-03-15T10:00:00.000Z');

function makeService() {
  const gateway = new InMemoryAccountGateway();
  const service = new AccountService({ gateway, clock: () => NOW });
  return { gateway, service };
}

const bob = { name: 'Bob', email: 'bob@x.com', address: '1 Main St', phone_number: '555-1111' };

async function expectAppError(promise: Promise<unknown>, status: number, message: string) {
  const err: unknown = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(AppError);
  if (err instanceof AppError) {
    expect(err.status).toBe(status);
    expect(err.message).toBe(message);
  }
}

describe('AccountService', () => {
  it('createAccount assigns an id and defaults date_joined to today', async () => {
    const { service } = makeService();

    const created = await service.createAccount(bob);

    expect(created).toEqual({
      id: 1,
      name: 'Bob',
      email: 'bob@x.com',
      address: '1 Main St',
      phoneNumber: '555-1111',
      dateJoined: '2026-03-15',
    });
  });

  it('createAccount rejects an invalid payload without storing anything', async () => {
    const { gateway, service } = makeService();

    await expectAppError(
      service.createAccount({ ...bob, name: undefined }),
      400,
      'Invalid Account: name is required',
    );
    expect(await gateway.listAll()).toEqual([]);
  });

  it('getAccount returns 404 for an unknown id', async () => {
    const { service } = makeService();

    await expectAppError(service.getAccount(42), 404, 'Account with id [42] could not be found.');
  });

  it('updateAccount checks existence before validating the payload', async () => {
    const { service } = makeService();

    await expectAppError(
      service.updateAccount(5, { name: 12 }),
      404,
      'Account with id [5] could not be found.',
    );
  });

  it('updateAccount replaces every field and keeps date_joined when omitted', async () => {
    const { service } = makeService();
    const created = await service.createAccount({ ...bob, date_joined: '2020-01-02' });

    const updated = await service.updateAccount(created.id, {
      name: 'Robert',
      email: 'robert@x.com',
      address: '2 Side St',
      phone_number: '555-2222',
    });

    expect(updated).toEqual({
      id: created.id,
      name: 'Robert',
      email: 'robert@x.com',
      address: '2 Side St',
      phoneNumber: '555-2222',
      dateJoined: '2020-01-02',
    });
  });

  it('updateAccount rejects an invalid payload for an existing account', async () => {
    const { service } = makeService();
    const created = await service.createAccount(bob);

    await expectAppError(
      service.updateAccount(created.id, { ...bob, email: 5 }),
      400,
      'Invalid Account: email must be a string',
    );
    expect(await service.getAccount(created.id)).toEqual(created);
  });

  it('updateAccount returns 404 when the row disappears before the write', async () => {
    const { gateway, service } = makeService();
    const created = await service.createAccount(bob);
    vi.spyOn(gateway, 'update').mockResolvedValue(undefined);

    await expectAppError(
      service.updateAccount(created.id, bob),
      404,
      `Account with id [${created.id}] could not be found.`,
    );
  });

  it('deleteAccount is idempotent', async () => {
    const { service } = makeService();
    const created = await service.createAccount(bob);

    expect(await service.deleteAccount(created.id)).toBe(true);
    expect(await service.deleteAccount(created.id)).toBe(false);
    expect(await service.listAccounts()).toEqual([]);
  });

  it('listAccounts returns every account in id order', async () => {
    const { service } = makeService();
    await service.createAccount(bob);
    await service.createAccount({ ...bob, name: 'Alice' });

    const names = (await service.listAccounts()).map((a) => `${a.id}:${a.name}`);
    expect(names).toEqual(['1:Bob', '2:Alice']);
  });
});
