import { timingSafeEqual } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { Logger } from '../logger';
import type { AccountId } from '../types/account';
import { readBearerToken, verifyToken } from '../auth/jwt';
import { UnauthorizedError } from '../errors';

export type ApiEnv = {
  Variables: {
    accountId: AccountId;
  };
};

export function createAuthMiddleware(jwtSecret: string, logger: Logger) {
  return createMiddleware<ApiEnv>(async (c, next) => {
    const token = readBearerToken(c.req.header('authorization'));
    if (!token) {
      throw new UnauthorizedError();
    }

    const result = await verifyToken(token, jwtSecret);
    if (!result.success) {
      logger.debug({ reason: result.reason, path: c.req.path }, 'Bearer token rejected');
      throw new UnauthorizedError();
    }

    c.set('accountId', result.accountId);
    await next();
  });
}

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Guards operator routes with a static `Authorization: Bearer <ADMIN_API_KEY>`. */
export function createAdminKeyMiddleware(adminApiKey: string) {
  return createMiddleware(async (c, next) => {
    const key = readBearerToken(c.req.header('authorization'));
    if (!key || !sameSecret(key, adminApiKey)) {
      throw new UnauthorizedError();
    }
    await next();
  });
}
