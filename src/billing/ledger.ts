import type { AccountId, AdmissionRejection, BillingCycle } from '../types/account';
import type { AccountStore, CycleStore } from '../storage/interfaces';
import { NotFoundError, QuotaExceededError } from '../errors';
import { DEFAULT_CYCLE_PLAN, getCycleState, planCycle, rejectionFor, type CyclePlan } from './cycle';

export type AdmissionCheck =
  | { admitted: true; cycle: BillingCycle }
  | { admitted: false; reason: AdmissionRejection };

export interface SubscriptionLedger {
  /**
   * Read-only and advisory: nothing is reserved, so concurrent requests that
   * all pass may together overshoot the ceiling by their in-flight cost.
   */
  checkAdmission(accountId: AccountId): Promise<AdmissionCheck>;
  /** Adds the actual cost of a completed request to the current cycle. */
  commitUsage(accountId: AccountId, cost: number): Promise<BillingCycle>;
  getUsage(accountId: AccountId): Promise<BillingCycle | undefined>;
  /** Renewal hook for an external process; never called by the gateway itself. */
  startCycle(accountId: AccountId, plan?: Partial<CyclePlan>): Promise<BillingCycle>;
}

export interface SubscriptionLedgerOptions {
  cycleStore: CycleStore;
  accountStore: AccountStore;
  plan?: CyclePlan;
  now?: () => Date;
}

export function createSubscriptionLedger(options: SubscriptionLedgerOptions): SubscriptionLedger {
  const { cycleStore, accountStore } = options;
  const plan = options.plan ?? DEFAULT_CYCLE_PLAN;
  const now = options.now ?? (() => new Date());

  return {
    async checkAdmission(accountId) {
      const cycle = await cycleStore.getCycle(accountId);
      if (!cycle) {
        return { admitted: false, reason: 'no_subscription' };
      }

      const state = getCycleState(cycle, now());
      if (state !== 'active') {
        return { admitted: false, reason: rejectionFor(state) };
      }

      return { admitted: true, cycle };
    },

    async commitUsage(accountId, cost) {
      if (!Number.isFinite(cost) || cost < 0) {
        throw new RangeError(`Usage cost must be a finite, non-negative number (got ${cost})`);
      }

      const cycle = await cycleStore.incrementUsage(accountId, cost);
      if (!cycle) {
        throw new QuotaExceededError('no_subscription');
      }
      return cycle;
    },

    getUsage(accountId) {
      return cycleStore.getCycle(accountId);
    },

    async startCycle(accountId, overrides = {}) {
      const account = await accountStore.findById(accountId);
      if (!account) {
        throw new NotFoundError(`Account ${accountId} not found`);
      }
      return cycleStore.replaceCycle(
        accountId,
        planCycle(now(), {
          quotaCeiling: overrides.quotaCeiling ?? plan.quotaCeiling,
          cycleDays: overrides.cycleDays ?? plan.cycleDays,
        })
      );
    },
  };
}
