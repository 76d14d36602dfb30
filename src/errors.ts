import type { AdmissionRejection } from './types/account';

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 502 | 504;

/**
 * Base class for conditions the caller can act on. Each carries a stable
 * `code` and the HTTP status the API answers with; anything that is not a
 * GatewayError is reported as a generic 500.
 */
export class GatewayError extends Error {
  readonly code: string;
  readonly status: ErrorStatus;

  constructor(code: string, status: ErrorStatus, message: string) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.status = status;
  }

  toJSON(): { error: string; code: string } {
    return { error: this.message, code: this.code };
  }
}

export class DuplicateIdentityError extends GatewayError {
  constructor() {
    super('duplicate_identity', 409, 'Email already registered');
    this.name = 'DuplicateIdentityError';
  }
}

export class InvalidCredentialsError extends GatewayError {
  constructor() {
    super('invalid_credentials', 401, 'Invalid email or password');
    this.name = 'InvalidCredentialsError';
  }
}

// Same message for missing, forged, expired and malformed tokens.
export class UnauthorizedError extends GatewayError {
  constructor() {
    super('invalid_token', 401, 'Invalid or missing token');
    this.name = 'UnauthorizedError';
  }
}

const QUOTA_MESSAGES: Record<AdmissionRejection, string> = {
  no_subscription: 'No active subscription',
  cycle_expired: 'Billing cycle has ended',
  quota_exhausted: 'Quota exceeded for the current billing cycle',
};

export class QuotaExceededError extends GatewayError {
  readonly reason: AdmissionRejection;

  constructor(reason: AdmissionRejection) {
    super(reason, 403, QUOTA_MESSAGES[reason]);
    this.name = 'QuotaExceededError';
    this.reason = reason;
  }
}

export class UnsupportedRequestTypeError extends GatewayError {
  readonly requestType: string;

  constructor(requestType: string) {
    super('unsupported_request_type', 400, `Only text requests are supported (got "${requestType}")`);
    this.name = 'UnsupportedRequestTypeError';
    this.requestType = requestType;
  }
}

export type UpstreamFailureKind = 'timeout' | 'rate_limited' | 'upstream_error';

export class UpstreamFailureError extends GatewayError {
  readonly kind: UpstreamFailureKind;

  constructor(kind: UpstreamFailureKind, options?: { cause?: unknown }) {
    super(
      'upstream_failure',
      kind === 'timeout' ? 504 : 502,
      kind === 'timeout'
        ? 'Completion service timed out'
        : kind === 'rate_limited'
          ? 'Completion service is rate limiting requests'
          : 'Completion service failed'
    );
    this.name = 'UpstreamFailureError';
    this.kind = kind;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class InvalidRequestError extends GatewayError {
  readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super('invalid_request', 400, message);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }

  override toJSON(): { error: string; code: string; issues: unknown[] } {
    return { ...super.toJSON(), issues: this.issues };
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super('not_found', 404, message);
    this.name = 'NotFoundError';
  }
}
