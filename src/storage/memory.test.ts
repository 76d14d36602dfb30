import { describe, it, expect } from 'vitest';
import { createInMemoryStores } from './memory';
import { DuplicateIdentityError } from '../errors';

const CREATED = new Date('2026-02-01T00:00:00.000Z');
const CYCLE = { cycleEnd: new Date('2026-03-03T00:00:00.000Z'), quotaCeiling: 500 };

function newAccount(email: string) {
  return { email, passwordHash: 'salt:hash', createdAt: CREATED };
}

describe('createInMemoryStores', () => {
  describe('accountStore', () => {
    it('assigns increasing ids and opens a cycle with zero usage', async () => {
      const { accountStore, cycleStore } = createInMemoryStores();

      const first = await accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);
      const second = await accountStore.createWithCycle(newAccount('b@x.com'), CYCLE);

      expect(first.account.id).toBe(1);
      expect(second.account.id).toBe(2);
      expect(await cycleStore.getCycle(2)).toEqual({
        id: 2,
        accountId: 2,
        cycleEnd: CYCLE.cycleEnd,
        quotaCeiling: 500,
        tokensUsed: 0,
      });
    });

    it('normalizes the email on write and lookup', async () => {
      const { accountStore } = createInMemoryStores();
      await accountStore.createWithCycle(newAccount('  Alice@X.com '), CYCLE);

      const found = await accountStore.findByEmail('ALICE@x.COM');
      expect(found?.email).toBe('alice@x.com');
    });

    it('rejects a duplicate and leaves no partial state', async () => {
      const { accountStore, cycleStore } = createInMemoryStores();
      await accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);

      await expect(
        accountStore.createWithCycle(newAccount('A@x.com'), CYCLE)
      ).rejects.toBeInstanceOf(DuplicateIdentityError);
      expect(await accountStore.findById(2)).toBeUndefined();
      expect(await cycleStore.getCycle(2)).toBeUndefined();
    });

    it('returns undefined for unknown accounts', async () => {
      const { accountStore } = createInMemoryStores();
      expect(await accountStore.findById(1)).toBeUndefined();
      expect(await accountStore.findByEmail('a@x.com')).toBeUndefined();
    });
  });

  describe('cycleStore', () => {
    it('returns snapshots that callers cannot mutate', async () => {
      const { accountStore, cycleStore } = createInMemoryStores();
      await accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);

      const snapshot = await cycleStore.getCycle(1);
      if (!snapshot) throw new Error('cycle missing');
      snapshot.tokensUsed = 999;
      snapshot.cycleEnd.setTime(0);

      const fresh = await cycleStore.getCycle(1);
      expect(fresh?.tokensUsed).toBe(0);
      expect(fresh?.cycleEnd).toEqual(CYCLE.cycleEnd);
    });

    it('increments usage and reports the new total', async () => {
      const { accountStore, cycleStore } = createInMemoryStores();
      await accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);

      await cycleStore.incrementUsage(1, 12.5);
      const cycle = await cycleStore.incrementUsage(1, 7.5);
      expect(cycle?.tokensUsed).toBe(20);
    });

    it('returns undefined when incrementing an account without a cycle', async () => {
      const { cycleStore } = createInMemoryStores();
      expect(await cycleStore.incrementUsage(1, 10)).toBeUndefined();
    });

    it('replaces the cycle with a new id and zero usage', async () => {
      const { accountStore, cycleStore } = createInMemoryStores();
      await accountStore.createWithCycle(newAccount('a@x.com'), CYCLE);
      await cycleStore.incrementUsage(1, 300);

      const next = { cycleEnd: new Date('2026-04-02T00:00:00.000Z'), quotaCeiling: 800 };
      const replaced = await cycleStore.replaceCycle(1, next);

      expect(replaced).toEqual({ id: 2, accountId: 1, tokensUsed: 0, ...next });
      expect(await cycleStore.getCycle(1)).toEqual(replaced);
    });
  });
});
