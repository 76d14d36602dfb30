import * as jose from 'jose';
import { z } from 'zod';
import type { AccountId } from '../types/account';

const ALGORITHM = 'HS256';

/** Why a token was turned away. Logged server-side only. */
export type TokenRejection = 'malformed' | 'forged' | 'expired' | 'wrong_shape';

export interface TokenAccepted {
  success: true;
  accountId: AccountId;
}

export interface TokenRejected {
  success: false;
  reason: TokenRejection;
}

export type VerifyTokenResult = TokenAccepted | TokenRejected;

export interface IssueTokenOptions {
  secret: string;
  /** jose time span such as "7d"; omitted means the token never expires. */
  expiresIn?: string;
}

const claimsSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/),
});

function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

export async function issueToken(
  accountId: AccountId,
  options: IssueTokenOptions
): Promise<string> {
  const jwt = new jose.SignJWT({})
    .setProtectedHeader({ alg: ALGORITHM })
    .setSubject(String(accountId))
    .setIssuedAt();

  if (options.expiresIn) {
    jwt.setExpirationTime(options.expiresIn);
  }

  return jwt.sign(encodeSecret(options.secret));
}

function classifyJoseError(err: jose.errors.JOSEError): TokenRejection {
  if (err instanceof jose.errors.JWTExpired) return 'expired';
  if (err instanceof jose.errors.JWSSignatureVerificationFailed) return 'forged';
  return 'malformed';
}

/**
 * Verifies signature, algorithm and (when present) expiry, then checks that
 * the subject is an account id. jose's own failures become a rejection; any
 * other error propagates.
 */
export async function verifyToken(
  token: string,
  secret: string
): Promise<VerifyTokenResult> {
  let payload: jose.JWTPayload;
  try {
    ({ payload } = await jose.jwtVerify(token, encodeSecret(secret), {
      algorithms: [ALGORITHM],
    }));
  } catch (err) {
    if (err instanceof jose.errors.JOSEError) {
      return { success: false, reason: classifyJoseError(err) };
    }
    throw err;
  }

  const claims = claimsSchema.safeParse(payload);
  if (!claims.success) {
    return { success: false, reason: 'wrong_shape' };
  }

  const accountId = Number(claims.data.sub);
  if (!Number.isSafeInteger(accountId)) {
    return { success: false, reason: 'wrong_shape' };
  }

  return { success: true, accountId };
}

const BEARER = /^bearer\s+(\S+)\s*$/i;

/**
 * Pulls the token out of an `Authorization: Bearer <token>` header. The scheme
 * is case-insensitive, so `token_type` from /login can be echoed back as is.
 */
export function readBearerToken(header: string | undefined | null): string | undefined {
  if (!header) return undefined;
  return BEARER.exec(header)?.[1];
}
