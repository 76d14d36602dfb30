// ─── Client ──────────────────────────────────────────────────────────────────

export interface GatewayClientOptions {
  /** Base URL of the gateway, e.g. "https://gateway.example.com". */
  baseUrl: string;
  /** Bearer token from a previous login, if already known. */
  token?: string;
}

// ─── Account ─────────────────────────────────────────────────────────────────

export interface Credentials {
  email: string;
  password: string;
}

export interface RegisterResponse {
  message: string;
  accountId: number;
}

export interface LoginResponse {
  access_token: string;
  token_type: "bearer";
}

// ─── Chat ────────────────────────────────────────────────────────────────────

export interface ChatRequest {
  message: string;
  /** Only "text" is accepted by the gateway. Defaults to "text". */
  type?: string;
}

export interface ChatResponse {
  response: string;
  /** Cost units charged for this request. */
  tokens: number;
}

// ─── Usage ───────────────────────────────────────────────────────────────────

export type CycleState = "active" | "quota_exhausted" | "expired";

export interface UsageResponse {
  used: number;
  quota: number;
  /** ISO-8601 end of the current billing cycle. */
  cycleEnd: string;
  state: CycleState;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export interface GatewayErrorBody {
  error: string;
  code: string;
  issues?: unknown[];
}
