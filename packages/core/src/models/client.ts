// packages/core/src/models/client.ts — Provider calls through the Vercel AI SDK

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import type { ModelProvider, ProviderCredentials, RetrySettings } from '../types/config.js';
import type { ChatMessage, InvokeRequest, ModelInvocation } from '../types/models.js';
import { DEFAULT_TIMEOUT_SEC } from '../utils/constants.js';
import { ModelError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { withCanonicalRetry } from '../utils/retry.js';
import { PriceTable, estimateTokens } from './pricing.js';

/**
 * Stateless model invocation. Callers pass the full history on every call.
 */
export interface ModelClient {
  readonly prices: PriceTable;
  invoke(request: InvokeRequest): Promise<ModelInvocation>;
}

export type ModelResolver = (modelId: string, provider: ModelProvider) => LanguageModel;

export interface AiSdkModelClientOptions {
  prices: PriceTable;
  credentials?: ProviderCredentials;
  retry?: Partial<RetrySettings>;
  /** Per-attempt timeout in seconds. */
  timeout?: number;
  /** Replaces the default OpenAI / Anthropic provider lookup. */
  resolveModel?: ModelResolver;
  logger?: Logger;
}

/**
 * Build the default resolver. Provider instances are created lazily, once each.
 */
export function createProviderResolver(credentials: ProviderCredentials = {}): ModelResolver {
  let openai: ReturnType<typeof createOpenAI> | undefined;
  let anthropic: ReturnType<typeof createAnthropic> | undefined;

  return (modelId, provider) => {
    switch (provider) {
      case 'openai':
        openai ??= createOpenAI({
          apiKey: credentials.openaiApiKey,
          baseURL: credentials.openaiBaseUrl,
        });
        // Chat Completions keeps OpenAI-compatible servers reachable through baseURL
        return openai.chat(modelId);
      case 'anthropic':
        anthropic ??= createAnthropic({ apiKey: credentials.anthropicApiKey });
        return anthropic(modelId);
    }
  };
}

export class AiSdkModelClient implements ModelClient {
  readonly prices: PriceTable;
  private readonly resolveModel: ModelResolver;
  private readonly retry: Partial<RetrySettings>;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AiSdkModelClientOptions) {
    this.prices = options.prices;
    this.resolveModel = options.resolveModel ?? createProviderResolver(options.credentials);
    this.retry = options.retry ?? {};
    this.timeoutMs = (options.timeout ?? DEFAULT_TIMEOUT_SEC) * 1000;
    this.logger = options.logger ?? createLogger('silent');
  }

  async invoke(request: InvokeRequest): Promise<ModelInvocation> {
    const { modelId, signal } = request;
    // Unknown ids throw ConfigError before any network traffic
    const provider = this.prices.providerOf(modelId);
    const model = this.resolveModel(modelId, provider);
    const messages = toModelMessages(request.messages);
    const start = Date.now();

    const attempt = await withCanonicalRetry(
      () =>
        generateText({
          model,
          messages,
          maxOutputTokens: request.maxOutputTokens,
          temperature: request.temperature,
          maxRetries: 0,
          abortSignal: this.attemptSignal(signal),
        }),
      {
        ...this.retry,
        signal,
        onRetry: (n, err, delayMs) => {
          this.logger.warn(
            `${request.recursion.callerTier} call to ${modelId} failed (attempt ${n}), retrying in ${delayMs}ms: ${errorMessage(err)}`,
          );
        },
      },
    );

    if (!attempt.result) {
      const cause = attempt.error ?? new Error('Model call failed');
      if (signal?.aborted) throw cause;
      throw new ModelError(
        `${provider} call to ${modelId} failed after ${attempt.attempts} attempt(s): ${cause.message}`,
        provider,
        modelId,
        statusCodeOf(cause),
      );
    }

    const { text, usage } = attempt.result;
    const reported = usage.inputTokens !== undefined && usage.outputTokens !== undefined;
    const promptTokens = usage.inputTokens ?? estimateTokens(joinMessages(request.messages));
    const completionTokens = usage.outputTokens ?? estimateTokens(text);

    return {
      text,
      model: modelId,
      promptTokens,
      completionTokens,
      costUsd: this.prices.cost(modelId, promptTokens, completionTokens),
      durationMs: Date.now() - start,
      meteringSource: reported ? 'sdk' : 'estimated',
    };
  }

  private attemptSignal(caller?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return caller ? AbortSignal.any([caller, timeout]) : timeout;
  }
}

function toModelMessages(messages: ChatMessage[]): ModelMessage[] {
  return messages.map((m): ModelMessage => {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
      case 'assistant':
        return { role: 'assistant', content: m.content };
    }
  });
}

function joinMessages(messages: ChatMessage[]): string {
  return messages.map((m) => m.content).join('\n');
}

function statusCodeOf(err: unknown): number | undefined {
  return APICallError.isInstance(err) ? err.statusCode : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
