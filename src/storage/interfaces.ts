import type {
  Account,
  AccountId,
  BillingCycle,
  NewAccount,
  NewBillingCycle,
} from '../types/account';

export interface AccountStore {
  /**
   * Creates the account together with its first billing cycle, atomically.
   * Throws DuplicateIdentityError when the email is taken.
   */
  createWithCycle(account: NewAccount, cycle: NewBillingCycle): Promise<{
    account: Account;
    cycle: BillingCycle;
  }>;
  findById(id: AccountId): Promise<Account | undefined>;
  /** Case-insensitive. */
  findByEmail(email: string): Promise<Account | undefined>;
}

export interface CycleStore {
  getCycle(accountId: AccountId): Promise<BillingCycle | undefined>;
  /**
   * Adds `cost` to `tokensUsed` in one atomic step, so concurrent increments
   * for the same account are never lost. Returns undefined when the account
   * has no cycle.
   */
  incrementUsage(accountId: AccountId, cost: number): Promise<BillingCycle | undefined>;
  /** Replaces the account's cycle with a fresh one (usage reset to zero). */
  replaceCycle(accountId: AccountId, cycle: NewBillingCycle): Promise<BillingCycle>;
}

export interface GatewayStores {
  accountStore: AccountStore;
  cycleStore: CycleStore;
}
