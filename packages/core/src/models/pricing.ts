// packages/core/src/models/pricing.ts

import type { ModelProvider, PriceEntry } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Static pricing table for known models (USD per 1M tokens).
 * Updated: 2026-02.
 */
const BUILT_IN_PRICING: Readonly<Record<string, PriceEntry>> = {
  // OpenAI
  'gpt-5': { provider: 'openai', inputPer1M: 5, outputPer1M: 15 },
  'gpt-5-mini': { provider: 'openai', inputPer1M: 0.3, outputPer1M: 1.2 },
  o3: { provider: 'openai', inputPer1M: 10, outputPer1M: 40 },
  'o4-mini': { provider: 'openai', inputPer1M: 1.1, outputPer1M: 4.4 },
  'gpt-4o': { provider: 'openai', inputPer1M: 2.5, outputPer1M: 10 },
  'gpt-4o-mini': { provider: 'openai', inputPer1M: 0.15, outputPer1M: 0.6 },
  'gpt-4-turbo': { provider: 'openai', inputPer1M: 10, outputPer1M: 30 },
  'gpt-3.5-turbo': { provider: 'openai', inputPer1M: 0.5, outputPer1M: 1.5 },
  // Anthropic
  'claude-opus-4-1': { provider: 'anthropic', inputPer1M: 15, outputPer1M: 75 },
  'claude-sonnet-4-5': { provider: 'anthropic', inputPer1M: 3, outputPer1M: 15 },
  'claude-haiku-4-5': { provider: 'anthropic', inputPer1M: 1, outputPer1M: 5 },
};

/**
 * Immutable model price table. Built once from the built-in entries plus
 * config overrides and handed to the model client at construction.
 */
export class PriceTable {
  private readonly entries: ReadonlyMap<string, Readonly<PriceEntry>>;

  constructor(overrides: Record<string, PriceEntry> = {}) {
    const merged = new Map<string, Readonly<PriceEntry>>();
    for (const [id, entry] of Object.entries({ ...BUILT_IN_PRICING, ...overrides })) {
      merged.set(id, Object.freeze({ ...entry }));
    }
    this.entries = merged;
  }

  has(modelId: string): boolean {
    return this.entries.has(modelId);
  }

  /** Throws ConfigError for model ids without a price. */
  get(modelId: string): Readonly<PriceEntry> {
    const entry = this.entries.get(modelId);
    if (!entry) {
      throw new ConfigError(
        `Unknown model "${modelId}": no price entry. Known models: ${this.modelIds().join(', ')}`,
        'pricing',
      );
    }
    return entry;
  }

  providerOf(modelId: string): ModelProvider {
    return this.get(modelId).provider;
  }

  /** Fail closed on any unpriced id. */
  assertKnown(...modelIds: string[]): void {
    for (const id of modelIds) this.get(id);
  }

  /** Cost in USD for one call. */
  cost(modelId: string, promptTokens: number, completionTokens: number): number {
    const entry = this.get(modelId);
    return (promptTokens * entry.inputPer1M + completionTokens * entry.outputPer1M) / 1_000_000;
  }

  modelIds(): string[] {
    return [...this.entries.keys()].sort();
  }

  list(): Array<{ modelId: string } & Readonly<PriceEntry>> {
    return this.modelIds().map((modelId) => ({ modelId, ...this.get(modelId) }));
  }
}

/** Rough token count when the provider reports none: 4 chars per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
