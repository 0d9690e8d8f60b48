// packages/core/src/types/models.ts

/**
 * Chat message format. Aligns with Vercel AI SDK's ModelMessage for text-only turns.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type CallerTier = 'root' | 'sub';

/** Position of a call in the recursion tree. The root loop runs at depth 0. */
export interface RecursionContext {
  depth: number;
  callerTier: CallerTier;
}

export interface InvokeRequest {
  modelId: string;
  messages: ChatMessage[];
  maxOutputTokens: number;
  recursion: RecursionContext;
  temperature?: number;
  signal?: AbortSignal;
}

export type MeteringSource = 'sdk' | 'estimated';

export interface ModelInvocation {
  text: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  costUsd: number;
  durationMs: number;
  meteringSource: MeteringSource;
}

/** One record per client call, root or sub. */
export interface UsageRecord {
  modelId: string;
  tier: CallerTier;
  depth: number;
  iteration: number;
  promptTokens: number;
  completionTokens: number;
  costUsd: number;
  durationMs: number;
}

export interface ModelUsageLine {
  modelId: string;
  calls: number;
  promptTokens: number;
  completionTokens: number;
  costUsd: number;
}

/** Per-model usage lines and totals for one session. */
export interface UsageSummary {
  models: ModelUsageLine[];
  calls: number;
  promptTokens: number;
  completionTokens: number;
  totalCost: number;
}
