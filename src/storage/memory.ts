import type {
  Account,
  AccountId,
  BillingCycle,
  NewAccount,
  NewBillingCycle,
} from '../types/account';
import type { AccountStore, CycleStore, GatewayStores } from './interfaces';
import { DuplicateIdentityError } from '../errors';

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// Callers get snapshots; the maps below are only changed in here.
function copyCycle(cycle: BillingCycle): BillingCycle {
  return { ...cycle, cycleEnd: new Date(cycle.cycleEnd) };
}

/**
 * Account and cycle stores sharing one in-process state. Every mutation runs
 * synchronously between awaits, which makes each one atomic on the event loop.
 */
export function createInMemoryStores(): GatewayStores {
  const accounts = new Map<AccountId, Account>();
  const emailIndex = new Map<string, AccountId>();
  const cycles = new Map<AccountId, BillingCycle>();
  let nextAccountId = 1;
  let nextCycleId = 1;

  const accountStore: AccountStore = {
    async createWithCycle(
      input: NewAccount,
      cycleInput: NewBillingCycle
    ): Promise<{ account: Account; cycle: BillingCycle }> {
      const email = normalizeEmail(input.email);
      if (emailIndex.has(email)) {
        throw new DuplicateIdentityError();
      }

      const account: Account = {
        id: nextAccountId++,
        email,
        passwordHash: input.passwordHash,
        createdAt: input.createdAt,
      };
      const cycle: BillingCycle = {
        id: nextCycleId++,
        accountId: account.id,
        cycleEnd: new Date(cycleInput.cycleEnd),
        quotaCeiling: cycleInput.quotaCeiling,
        tokensUsed: 0,
      };

      accounts.set(account.id, account);
      emailIndex.set(email, account.id);
      cycles.set(account.id, cycle);

      return { account: { ...account }, cycle: copyCycle(cycle) };
    },

    async findById(id: AccountId): Promise<Account | undefined> {
      const account = accounts.get(id);
      return account ? { ...account } : undefined;
    },

    async findByEmail(email: string): Promise<Account | undefined> {
      const id = emailIndex.get(normalizeEmail(email));
      return id !== undefined ? this.findById(id) : undefined;
    },
  };

  const cycleStore: CycleStore = {
    async getCycle(accountId: AccountId): Promise<BillingCycle | undefined> {
      const cycle = cycles.get(accountId);
      return cycle ? copyCycle(cycle) : undefined;
    },

    async incrementUsage(accountId: AccountId, cost: number): Promise<BillingCycle | undefined> {
      const cycle = cycles.get(accountId);
      if (!cycle) return undefined;
      cycle.tokensUsed += cost;
      return copyCycle(cycle);
    },

    async replaceCycle(accountId: AccountId, cycleInput: NewBillingCycle): Promise<BillingCycle> {
      const cycle: BillingCycle = {
        id: nextCycleId++,
        accountId,
        cycleEnd: new Date(cycleInput.cycleEnd),
        quotaCeiling: cycleInput.quotaCeiling,
        tokensUsed: 0,
      };
      cycles.set(accountId, cycle);
      return copyCycle(cycle);
    },
  };

  return { accountStore, cycleStore };
}
