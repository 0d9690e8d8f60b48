// packages/core/src/types/session.ts

import type { UsageRecord, UsageSummary } from './models.js';

export type StepKind = 'execution' | 'response' | 'final';

export interface IterationStep {
  readonly iteration: number;
  readonly kind: StepKind;
  /** Raw model text for the turn. */
  readonly response: string;
  readonly code?: string;
  /** Captured output, untruncated. */
  readonly output?: string;
  readonly error?: string;
  readonly durationMs: number;
}

export type SessionStatus = 'running' | 'completed' | 'exhausted' | 'failed';

export type TerminalStatus = 'completed' | 'exhausted';

export interface SessionResult {
  readonly sessionId: string;
  readonly answer: string;
  readonly success: boolean;
  readonly status: TerminalStatus;
  readonly iterations: number;
  readonly totalCost: number;
  readonly usage: readonly UsageRecord[];
  readonly usageSummary: UsageSummary;
  readonly trajectory: readonly IterationStep[];
}

/** Caller-facing serialization of a SessionResult. */
export interface SessionPayload {
  answer: string;
  success: boolean;
  iterations: number;
  total_cost: number;
  usage_summary: {
    calls: number;
    prompt_tokens: number;
    completion_tokens: number;
    total_cost: number;
    models: Array<{ model: string; calls: number; prompt_tokens: number; completion_tokens: number; cost: number }>;
  };
  trajectory: Array<{
    iteration: number;
    type: StepKind;
    code?: string;
    response?: string;
    output?: string;
    error?: string;
  }>;
}

export type ContextInput = string | string[];

/** Persisted session row. */
export interface SessionRecord {
  id: string;
  query: string;
  contextType: 'string' | 'list';
  contextLength: number;
  rootModel: string;
  subModel: string;
  status: SessionStatus;
  answer: string | null;
  iterations: number;
  totalCost: number;
  error: string | null;
  configSnapshot: string;
  /** Set when the session finishes with a result. */
  usageSummary: UsageSummary | null;
  startedAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface StepRecord extends IterationStep {
  sessionId: string;
  createdAt: string;
}
