import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createSqliteStores, openDatabase } from './sqlite';
import { DuplicateIdentityError } from '../errors';
import type { GatewayStores } from './interfaces';

const CREATED = new Date('2026-02-01T00:00:00.000Z');
const CYCLE = { cycleEnd: new Date('2026-03-03T00:00:00.000Z'), quotaCeiling: 500 };

function newAccount(email: string) {
  return { email, passwordHash: 'salt:hash', createdAt: CREATED };
}

describe('createSqliteStores', () => {
  let db: Database.Database;
  let stores: GatewayStores;

  const count = (table: 'accounts' | 'billing_cycles') =>
    db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n;

  beforeEach(() => {
    db = openDatabase(':memory:');
    stores = createSqliteStores(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates the account and its cycle together', async () => {
    const { account, cycle } = await stores.accountStore.createWithCycle(
      newAccount(' A@X.com'),
      CYCLE
    );

    expect(account).toEqual({
      id: 1,
      email: 'a@x.com',
      passwordHash: 'salt:hash',
      createdAt: CREATED,
    });
    expect(cycle).toEqual({
      id: 1,
      accountId: 1,
      cycleEnd: CYCLE.cycleEnd,
      quotaCeiling: 500,
      tokensUsed: 0,
    });
  });

  it('maps a duplicate email to DuplicateIdentityError without writing a row', async () => {
    await stores.accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);

    await expect(
      stores.accountStore.createWithCycle(newAccount('A@x.com'), CYCLE)
    ).rejects.toBeInstanceOf(DuplicateIdentityError);
    expect(count('accounts')).toBe(1);
    expect(count('billing_cycles')).toBe(1);
  });

  it('finds accounts by id and by email', async () => {
    await stores.accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);

    expect((await stores.accountStore.findById(1))?.email).toBe('a@x.com');
    expect((await stores.accountStore.findByEmail('A@X.COM'))?.id).toBe(1);
    expect(await stores.accountStore.findByEmail('b@x.com')).toBeUndefined();
  });

  it('increments usage in place', async () => {
    await stores.accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);

    await Promise.all(Array.from({ length: 10 }, () => stores.cycleStore.incrementUsage(1, 3)));

    expect((await stores.cycleStore.getCycle(1))?.tokensUsed).toBe(30);
  });

  it('returns undefined when there is no cycle to increment', async () => {
    expect(await stores.cycleStore.incrementUsage(7, 1)).toBeUndefined();
  });

  it('replaces the cycle and resets usage', async () => {
    await stores.accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);
    await stores.cycleStore.incrementUsage(1, 250);

    const next = { cycleEnd: new Date('2026-04-02T00:00:00.000Z'), quotaCeiling: 1000 };
    const replaced = await stores.cycleStore.replaceCycle(1, next);

    expect(replaced).toMatchObject({ accountId: 1, tokensUsed: 0, ...next });
    expect(count('billing_cycles')).toBe(1);
    expect(await stores.cycleStore.getCycle(1)).toEqual(replaced);
  });
});
