import { Hono, type Context, type ErrorHandler } from 'hono';
import { z } from 'zod';
import type { Logger } from '../logger';
import type { CredentialService } from '../auth/credentials';
import type { SubscriptionLedger } from '../billing/ledger';
import type { CompletionGateway } from '../proxy/handler';
import { issueToken, readBearerToken } from '../auth/jwt';
import { getCycleState } from '../billing/cycle';
import { GatewayError, InvalidRequestError, NotFoundError } from '../errors';
import { serializeError } from '../logger';
import { createAdminKeyMiddleware, createAuthMiddleware, type ApiEnv } from './middleware';

export interface ApiRouteDeps {
  credentials: CredentialService;
  ledger: SubscriptionLedger;
  gateway: CompletionGateway;
  logger: Logger;
  jwtSecret: string;
  tokenExpiresIn?: string;
  adminApiKey?: string;
  now?: () => Date;
}

const credentialsSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

const chatSchema = z.object({
  message: z.string().min(1),
  type: z.string().default('text'),
});

const startCycleSchema = z.object({
  quota: z.number().positive().optional(),
  days: z.number().int().positive().optional(),
});

const accountIdParam = z.coerce.number().int().positive();

async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  const body: unknown = await c.req.json().catch(() => undefined);
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new InvalidRequestError('Invalid request body', result.error.issues);
  }
  return result.data;
}

export function createErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof GatewayError) {
      return c.json(err.toJSON(), err.status);
    }
    logger.error(
      { error: serializeError(err), method: c.req.method, path: c.req.path },
      'Unhandled error'
    );
    return c.json({ error: 'Internal server error', code: 'internal_error' }, 500);
  };
}

export function createApiRoutes(deps: ApiRouteDeps) {
  const { credentials, ledger, gateway, logger, jwtSecret, tokenExpiresIn, adminApiKey } = deps;
  const now = deps.now ?? (() => new Date());
  const log = logger.child({ component: 'api' });
  const app = new Hono<ApiEnv>();
  const authMw = createAuthMiddleware(jwtSecret, log);

  app.onError(createErrorHandler(log));

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.post('/register', async (c) => {
    const { email, password } = await parseBody(c, credentialsSchema);
    const accountId = await credentials.register(email, password);
    log.info({ accountId }, 'Account registered');
    return c.json({ message: 'Registered! Login now.', accountId }, 201);
  });

  app.post('/login', async (c) => {
    const { email, password } = await parseBody(c, credentialsSchema);
    const accountId = await credentials.authenticate(email, password);
    const token = await issueToken(accountId, { secret: jwtSecret, expiresIn: tokenExpiresIn });
    return c.json({ access_token: token, token_type: 'bearer' });
  });

  // authMw turns away bad tokens before the body is looked at.
  app.post('/chat', authMw, async (c) => {
    const token = readBearerToken(c.req.header('authorization'));
    const request = await parseBody(c, chatSchema);
    const result = await gateway.chat(token, request);
    return c.json({ response: result.text, tokens: result.cost });
  });

  app.get('/usage', authMw, async (c) => {
    const accountId = c.get('accountId');
    const cycle = await ledger.getUsage(accountId);
    if (!cycle) {
      throw new NotFoundError('No active subscription');
    }
    return c.json({
      used: cycle.tokensUsed,
      quota: cycle.quotaCeiling,
      cycleEnd: cycle.cycleEnd.toISOString(),
      state: getCycleState(cycle, now()),
    });
  });

  if (adminApiKey) {
    const adminMw = createAdminKeyMiddleware(adminApiKey);

    // Cycle renewal, driven by an operator or billing job.
    app.post('/admin/accounts/:accountId/cycles', adminMw, async (c) => {
      const parsedId = accountIdParam.safeParse(c.req.param('accountId'));
      if (!parsedId.success) {
        throw new InvalidRequestError('Invalid account id', parsedId.error.issues);
      }
      const body = await parseBody(c, startCycleSchema);

      const cycle = await ledger.startCycle(parsedId.data, {
        quotaCeiling: body.quota,
        cycleDays: body.days,
      });
      log.info({ accountId: cycle.accountId, cycleEnd: cycle.cycleEnd.toISOString() }, 'Billing cycle started');

      return c.json(
        {
          accountId: cycle.accountId,
          used: cycle.tokensUsed,
          quota: cycle.quotaCeiling,
          cycleEnd: cycle.cycleEnd.toISOString(),
        },
        201
      );
    });
  }

  return app;
}
