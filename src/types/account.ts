/** Server-generated integer identity of an account. */
export type AccountId = number;

export interface Account {
  id: AccountId;
  /** Trimmed and lower-cased; unique across accounts. */
  email: string;
  passwordHash: string;
  createdAt: Date;
}

export interface NewAccount {
  email: string;
  passwordHash: string;
  createdAt: Date;
}

/** The single active billing cycle of an account. Amounts are in cost units. */
export interface BillingCycle {
  id: number;
  accountId: AccountId;
  cycleEnd: Date;
  quotaCeiling: number;
  tokensUsed: number;
}

export interface NewBillingCycle {
  cycleEnd: Date;
  quotaCeiling: number;
}

export type CycleState = 'active' | 'quota_exhausted' | 'expired';

/** Why an admission check turned a request away. */
export type AdmissionRejection = 'no_subscription' | 'cycle_expired' | 'quota_exhausted';

export interface ChatRequest {
  message: string;
  type: string;
}

export interface ChatResult {
  text: string;
  /** Cost units charged to the account's cycle. */
  cost: number;
}
