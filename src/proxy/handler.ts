import { randomUUID } from 'node:crypto';
import type { Logger } from '../logger';
import type { ChatRequest, ChatResult } from '../types/account';
import type { SubscriptionLedger } from '../billing/ledger';
import type { CompletionOutput, CompletionService } from './upstream';
import { verifyToken } from '../auth/jwt';
import {
  GatewayError,
  QuotaExceededError,
  UnauthorizedError,
  UnsupportedRequestTypeError,
  UpstreamFailureError,
} from '../errors';
import { serializeError } from '../logger';

export const DEFAULT_FALLBACK_COST = 50;

export interface CompletionGatewayDeps {
  jwtSecret: string;
  ledger: SubscriptionLedger;
  completionService: CompletionService;
  logger: Logger;
  fallbackCost?: number;
}

export interface CompletionGateway {
  chat(token: string | undefined, request: ChatRequest): Promise<ChatResult>;
}

export function createCompletionGateway(deps: CompletionGatewayDeps): CompletionGateway {
  const { jwtSecret, ledger, completionService, logger } = deps;
  const fallbackCost = deps.fallbackCost ?? DEFAULT_FALLBACK_COST;

  return {
    async chat(token, request) {
      const requestId = randomUUID();
      const reqLogger = logger.child({ component: 'gateway', requestId });

      if (!token) {
        reqLogger.debug('Missing bearer token');
        throw new UnauthorizedError();
      }
      const verified = await verifyToken(token, jwtSecret);
      if (!verified.success) {
        reqLogger.debug({ reason: verified.reason }, 'Bearer token rejected');
        throw new UnauthorizedError();
      }

      const { accountId } = verified;
      const accLogger = reqLogger.child({ accountId });

      if (request.type !== 'text') {
        accLogger.info({ type: request.type }, 'Unsupported request type');
        throw new UnsupportedRequestTypeError(request.type);
      }

      const admission = await ledger.checkAdmission(accountId);
      if (!admission.admitted) {
        accLogger.warn({ reason: admission.reason }, 'Request rejected by admission check');
        throw new QuotaExceededError(admission.reason);
      }

      // Nothing is charged unless this call completes: cost is only known afterwards.
      let output: CompletionOutput;
      try {
        output = await completionService.complete({ prompt: request.message });
      } catch (err) {
        if (err instanceof GatewayError) throw err;
        accLogger.error({ error: serializeError(err) }, 'Completion service threw');
        throw new UpstreamFailureError('upstream_error', { cause: err });
      }

      const reported = output.totalTokens;
      const cost =
        reported !== undefined && Number.isFinite(reported) && reported >= 0
          ? reported
          : fallbackCost;
      if (cost !== reported) {
        accLogger.info({ fallbackCost }, 'Upstream reported no usage; charging fallback cost');
      }

      const cycle = await ledger.commitUsage(accountId, cost);
      accLogger.info(
        { cost, tokensUsed: cycle.tokensUsed, quotaCeiling: cycle.quotaCeiling },
        'Usage committed'
      );

      return { text: output.text, cost };
    },
  };
}
