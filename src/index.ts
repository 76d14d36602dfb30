import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { GatewayConfig } from './config';
import type { Logger } from './logger';
import type { GatewayStores } from './storage/interfaces';
import type { CompletionService } from './proxy/upstream';
import { createLogger } from './logger';
import { createCredentialService } from './auth/credentials';
import { createSubscriptionLedger } from './billing/ledger';
import { createCompletionGateway } from './proxy/handler';
import { createApiRoutes, createErrorHandler } from './api/routes';

// Re-export types
export type { GatewayConfig } from './config';
export type { Logger, LogLevel, LogSink } from './logger';
export type { AccountStore, CycleStore, GatewayStores } from './storage/interfaces';
export type {
  AccountId,
  Account,
  BillingCycle,
  CycleState,
  AdmissionRejection,
  ChatRequest,
  ChatResult,
} from './types/account';
export type { VerifyTokenResult, TokenRejection } from './auth/jwt';
export type { CredentialService } from './auth/credentials';
export type { SubscriptionLedger, AdmissionCheck } from './billing/ledger';
export type { CyclePlan } from './billing/cycle';
export type {
  CompletionService,
  CompletionInput,
  CompletionOutput,
  ChatCompletionsClient,
} from './proxy/upstream';
export type { CompletionGateway } from './proxy/handler';

// Re-export implementations
export { loadConfig, ConfigError } from './config';
export { createLogger } from './logger';
export * from './errors';
export { createInMemoryStores } from './storage/memory';
export { openDatabase, createSqliteStores } from './storage/sqlite';
export { issueToken, verifyToken } from './auth/jwt';
export { hashPassword, verifyPassword } from './auth/password';
export { createCredentialService } from './auth/credentials';
export { createSubscriptionLedger } from './billing/ledger';
export { getCycleState, planCycle } from './billing/cycle';
export { createOpenAIClient, createOpenAICompletionService } from './proxy/upstream';
export { createCompletionGateway } from './proxy/handler';

export interface GatewayOptions {
  config: GatewayConfig;
  stores: GatewayStores;
  completionService: CompletionService;
  logger?: Logger;
  now?: () => Date;
}

export interface GatewayInstance {
  fetch: (request: Request) => Response | Promise<Response>;
}

export function createGateway(options: GatewayOptions): GatewayInstance {
  const { config, stores, completionService, now } = options;
  const logger = options.logger ?? createLogger(config.logLevel);
  const plan = { quotaCeiling: config.defaultQuota, cycleDays: config.cycleDays };

  const credentials = createCredentialService({ accountStore: stores.accountStore, plan, now });
  const ledger = createSubscriptionLedger({
    cycleStore: stores.cycleStore,
    accountStore: stores.accountStore,
    plan,
    now,
  });
  const gateway = createCompletionGateway({
    jwtSecret: config.jwtSecret,
    ledger,
    completionService,
    logger,
    fallbackCost: config.fallbackCost,
  });

  const apiApp = createApiRoutes({
    credentials,
    ledger,
    gateway,
    logger,
    jwtSecret: config.jwtSecret,
    tokenExpiresIn: config.tokenExpiresIn,
    adminApiKey: config.adminApiKey,
    now,
  });

  const app = new Hono();
  app.use('*', cors());
  app.onError(createErrorHandler(logger));
  app.route('/', apiApp);

  return {
    fetch: (request: Request) => app.fetch(request),
  };
}
