// packages/core/src/types/memory.ts

import type { CallerTier } from './models.js';

export interface CostLogEntry {
  id?: number;
  sessionId: string;
  iteration: number;
  tier: CallerTier;
  depth: number;
  modelId: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  latencyMs: number;
  createdAt: string;
}

export interface CostSummaryRow {
  modelId: string;
  calls: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}
