import { describe, it, expect } from 'vitest';
import {
  describeComplaints,
  deserializeAccount,
  serializeAccount,
  toIsoDate,
} from '../../../src/modules/accounts/account.codec';
import type { Account } from '../../../src/modules/accounts';

const DEFAULTS = { dateJoined: '2026-03-15' };

const account: Account = {
  id: 7,
  name: 'Bob',
  email: 'bob@x.com',
  address: '1 Main St',
  phoneNumber: '555-1111',
  dateJoined: '2024-05-06',
};

describe('serializeAccount', () => {
  it('maps every field to its wire name', () => {
    expect(serializeAccount(account)).toEqual({
      id: 7,
      name: 'Bob',
      email: 'bob@x.com',
      address: '1 Main St',
      phone_number: '555-1111',
      date_joined: '2024-05-06',
    });
  });
});

describe('deserializeAccount', () => {
  it('round-trips a serialized account on every field except id', () => {
    const result = deserializeAccount(serializeAccount(account), DEFAULTS);

    expect(result).toEqual({
      ok: true,
      draft: {
        name: 'Bob',
        email: 'bob@x.com',
        address: '1 Main St',
        phoneNumber: '555-1111',
        dateJoined: '2024-05-06',
      },
    });
  });

  it('defaults date_joined when it is absent or null', () => {
    const payload = { name: 'A', email: 'a@example.com', address: 'addr', phone_number: '1' };

    const absent = deserializeAccount(payload, DEFAULTS);
    const nulled = deserializeAccount({ ...payload, date_joined: null }, DEFAULTS);

    expect(absent.ok && absent.draft.dateJoined).toBe('2026-03-15');
    expect(nulled.ok && nulled.draft.dateJoined).toBe('2026-03-15');
  });

  it('ignores unknown keys and a client-supplied id', () => {
    const result = deserializeAccount(
      { ...serializeAccount(account), id: 999, nickname: 'bobby' },
      DEFAULTS,
    );

    expect(result).toEqual({
      ok: true,
      draft: {
        name: 'Bob',
        email: 'bob@x.com',
        address: '1 Main St',
        phoneNumber: '555-1111',
        dateJoined: '2024-05-06',
      },
    });
  });

  it('reports a missing required field', () => {
    const result = deserializeAccount(
      { email: 'a@example.com', address: 'addr', phone_number: '1' },
      DEFAULTS,
    );

    expect(result).toEqual({ ok: false, complaints: [{ field: 'name', message: 'is required' }] });
  });

  it('reports every missing field in declaration order', () => {
    const result = deserializeAccount({ name: 'not enough data' }, DEFAULTS);

    expect(result).toEqual({
      ok: false,
      complaints: [
        { field: 'email', message: 'is required' },
        { field: 'address', message: 'is required' },
        { field: 'phone_number', message: 'is required' },
      ],
    });
  });

  it('reports a value of the wrong type', () => {
    const result = deserializeAccount(
      { name: 42, email: 'a@example.com', address: 'addr', phone_number: '1' },
      DEFAULTS,
    );

    expect(result).toEqual({
      ok: false,
      complaints: [{ field: 'name', message: 'must be a string' }],
    });
  });

  it('reports a field longer than its column', () => {
    const result = deserializeAccount(
      { name: 'n'.repeat(65), email: 'a@example.com', address: 'addr', phone_number: '1' },
      DEFAULTS,
    );

    expect(result).toEqual({
      ok: false,
      complaints: [{ field: 'name', message: 'must be at most 64 characters' }],
    });
  });

  it('measures field length in characters, not UTF-16 units', () => {
    const name = '\u{1F600}'.repeat(64);

    const result = deserializeAccount(
      { name, email: 'a@example.com', address: 'addr', phone_number: '1' },
      DEFAULTS,
    );

    expect(result).toEqual({
      ok: true,
      draft: {
        name,
        email: 'a@example.com',
        address: 'addr',
        phoneNumber: '1',
        dateJoined: '2026-03-15',
      },
    });
    expect(
      deserializeAccount(
        { name: `${name}x`, email: 'a@example.com', address: 'addr', phone_number: '1' },
        DEFAULTS,
      ),
    ).toEqual({
      ok: false,
      complaints: [{ field: 'name', message: 'must be at most 64 characters' }],
    });
  });

  it('rejects year 0000, which a DATE column cannot hold', () => {
    const payload = {
      name: 'A',
      email: 'a@example.com',
      address: 'addr',
      phone_number: '1',
    };

    expect(deserializeAccount({ ...payload, date_joined: '0000-01-01' }, DEFAULTS)).toEqual({
      ok: false,
      complaints: [{ field: 'date_joined', message: 'must be an ISO date (YYYY-MM-DD)' }],
    });
    expect(deserializeAccount({ ...payload, date_joined: '0001-01-01' }, DEFAULTS)).toEqual({
      ok: true,
      draft: {
        name: 'A',
        email: 'a@example.com',
        address: 'addr',
        phoneNumber: '1',
        dateJoined: '0001-01-01',
      },
    });
  });

  it('rejects a date_joined that is not an ISO date', () => {
    const result = deserializeAccount(
      {
        name: 'A',
        email: 'a@example.com',
        address: 'addr',
        phone_number: '1',
        date_joined: 'last tuesday',
      },
      DEFAULTS,
    );

    expect(result).toEqual({
      ok: false,
      complaints: [{ field: 'date_joined', message: 'must be an ISO date (YYYY-MM-DD)' }],
    });
  });

  it('rejects a body that is not an object', () => {
    expect(deserializeAccount(['Bob'], DEFAULTS)).toEqual({
      ok: false,
      complaints: [{ field: '', message: 'request body must be a JSON object' }],
    });
    expect(deserializeAccount(undefined, DEFAULTS)).toEqual({
      ok: false,
      complaints: [{ field: '', message: 'request body must be a JSON object' }],
    });
  });
});

describe('describeComplaints', () => {
  it('joins field complaints into one sentence', () => {
    expect(
      describeComplaints([
        { field: '', message: 'request body must be a JSON object' },
        { field: 'name', message: 'is required' },
      ]),
    ).toBe('request body must be a JSON object; name is required');
  });
});

describe('toIsoDate', () => {
  it('uses the UTC calendar date', () => {
    expect(toIsoDate(new Date('2026-03-15T23:59:59.000Z'))).toBe('2026-03-15');
  });
});
