import type {
  AdmissionRejection,
  BillingCycle,
  CycleState,
  NewBillingCycle,
} from '../types/account';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CyclePlan {
  quotaCeiling: number;
  cycleDays: number;
}

export const DEFAULT_CYCLE_PLAN: CyclePlan = {
  quotaCeiling: 500,
  cycleDays: 30,
};

/** A fresh cycle starting at `now`. */
export function planCycle(now: Date, plan: CyclePlan = DEFAULT_CYCLE_PLAN): NewBillingCycle {
  return {
    cycleEnd: new Date(now.getTime() + plan.cycleDays * DAY_MS),
    quotaCeiling: plan.quotaCeiling,
  };
}

/**
 * `expired` wins over `quota_exhausted` when both hold: an ended cycle is
 * closed whatever its balance.
 */
export function getCycleState(cycle: BillingCycle, now: Date): CycleState {
  if (now.getTime() > cycle.cycleEnd.getTime()) return 'expired';
  if (cycle.tokensUsed >= cycle.quotaCeiling) return 'quota_exhausted';
  return 'active';
}

export function rejectionFor(state: Exclude<CycleState, 'active'>): AdmissionRejection {
  return state === 'expired' ? 'cycle_expired' : 'quota_exhausted';
}
