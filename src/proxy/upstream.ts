import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import type { Logger } from '../logger';
import { UpstreamFailureError, type UpstreamFailureKind } from '../errors';
import { serializeError } from '../logger';

export interface CompletionInput {
  prompt: string;
}

export interface CompletionOutput {
  text: string;
  /** Upstream-reported cost; undefined when the response carried no usage. */
  totalTokens?: number;
}

/**
 * The upstream text-completion provider. Implementations throw
 * UpstreamFailureError for timeouts, rate limits and provider errors.
 */
export interface CompletionService {
  complete(input: CompletionInput): Promise<CompletionOutput>;
}

/** The slice of the OpenAI SDK this module calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number }
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAICompletionOptions {
  client: ChatCompletionsClient;
  model: string;
  timeoutMs: number;
  logger: Logger;
}

export function createOpenAIClient(apiKey: string, maxRetries: number): OpenAI {
  return new OpenAI({ apiKey, maxRetries });
}

export function classifyUpstreamError(err: unknown): UpstreamFailureKind {
  if (err instanceof OpenAI.APIConnectionTimeoutError) return 'timeout';
  if (err instanceof OpenAI.APIError && err.status === 429) return 'rate_limited';
  return 'upstream_error';
}

export function createOpenAICompletionService(options: OpenAICompletionOptions): CompletionService {
  const { client, model, timeoutMs } = options;
  const log = options.logger.child({ component: 'upstream', model });

  return {
    async complete({ prompt }) {
      let completion: ChatCompletion;
      try {
        completion = await client.chat.completions.create(
          { model, messages: [{ role: 'user', content: prompt }] },
          { timeout: timeoutMs }
        );
      } catch (err) {
        const kind = classifyUpstreamError(err);
        log.warn({ kind, error: serializeError(err) }, 'Completion request failed');
        throw new UpstreamFailureError(kind, { cause: err });
      }

      const choice = completion.choices[0];
      if (!choice) {
        log.warn({ completionId: completion.id }, 'Completion returned no choices');
        throw new UpstreamFailureError('upstream_error');
      }

      log.debug(
        { completionId: completion.id, totalTokens: completion.usage?.total_tokens },
        'Completion received'
      );

      return {
        text: choice.message.content ?? '',
        totalTokens: completion.usage?.total_tokens,
      };
    },
  };
}
