import { describe, it, expect } from 'vitest';
import { getCycleState, planCycle, rejectionFor } from './cycle';
import type { BillingCycle } from '../types/account';

const END = new Date('2026-04-01T00:00:00.000Z');

function cycle(overrides: Partial<BillingCycle> = {}): BillingCycle {
  return { id: 1, accountId: 1, cycleEnd: END, quotaCeiling: 500, tokensUsed: 0, ...overrides };
}

describe('planCycle', () => {
  it('ends the cycle the configured number of days later', () => {
    const planned = planCycle(new Date('2026-03-02T12:00:00.000Z'), { quotaCeiling: 1000, cycleDays: 30 });
    expect(planned).toEqual({
      cycleEnd: new Date('2026-04-01T12:00:00.000Z'),
      quotaCeiling: 1000,
    });
  });

  it('defaults to 500 units over 30 days', () => {
    const planned = planCycle(new Date('2026-01-01T00:00:00.000Z'));
    expect(planned.quotaCeiling).toBe(500);
    expect(planned.cycleEnd.toISOString()).toBe('2026-01-31T00:00:00.000Z');
  });
});

describe('getCycleState', () => {
  const before = new Date('2026-03-15T00:00:00.000Z');
  const after = new Date('2026-04-02T00:00:00.000Z');

  it('is active below the ceiling before the end', () => {
    expect(getCycleState(cycle({ tokensUsed: 499 }), before)).toBe('active');
  });

  it('is still active at the exact end instant', () => {
    expect(getCycleState(cycle(), END)).toBe('active');
  });

  it('is quota_exhausted once usage reaches the ceiling', () => {
    expect(getCycleState(cycle({ tokensUsed: 500 }), before)).toBe('quota_exhausted');
    expect(getCycleState(cycle({ tokensUsed: 620 }), before)).toBe('quota_exhausted');
  });

  it('is expired after the end', () => {
    expect(getCycleState(cycle(), after)).toBe('expired');
  });

  it('reports expired when the cycle is both ended and exhausted', () => {
    expect(getCycleState(cycle({ tokensUsed: 500 }), after)).toBe('expired');
  });
});

describe('rejectionFor', () => {
  it('maps non-active states to admission rejections', () => {
    expect(rejectionFor('expired')).toBe('cycle_expired');
    expect(rejectionFor('quota_exhausted')).toBe('quota_exhausted');
  });
});
