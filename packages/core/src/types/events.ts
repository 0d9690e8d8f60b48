// packages/core/src/types/events.ts

import type { CallerTier } from './models.js';

/**
 * Engine event types, dot-separated names.
 * Emitted by the orchestrator and consumed by the CLI renderer and MCP server.
 */

// -- Lifecycle events --
export interface SessionStartedEvent {
  type: 'session.started';
  sessionId: string;
  query: string;
  rootModel: string;
  subModel: string;
  maxIterations: number;
  timestamp: string;
}

export interface SessionCompletedEvent {
  type: 'session.completed';
  sessionId: string;
  answer: string;
  iterations: number;
  totalCost: number;
  durationMs: number;
  timestamp: string;
}

export interface SessionExhaustedEvent {
  type: 'session.exhausted';
  sessionId: string;
  partialAnswer: string;
  iterations: number;
  totalCost: number;
  durationMs: number;
  timestamp: string;
}

export interface SessionFailedEvent {
  type: 'session.failed';
  sessionId: string;
  error: string;
  iteration: number;
  timestamp: string;
}

// -- Iteration events --
export interface IterationStartedEvent {
  type: 'iteration.started';
  sessionId: string;
  iteration: number;
  maxIterations: number;
  timestamp: string;
}

export interface ModelResponseEvent {
  type: 'model.response';
  sessionId: string;
  iteration: number;
  model: string;
  text: string;
  durationMs: number;
  timestamp: string;
}

export interface CodeExecutedEvent {
  type: 'code.executed';
  sessionId: string;
  iteration: number;
  code: string;
  output: string;
  error?: string;
  durationMs: number;
  timestamp: string;
}

// -- Cost events --
export interface CostUpdateEvent {
  type: 'cost.update';
  sessionId: string;
  model: string;
  tier: CallerTier;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  cumulativeSessionCost: number;
  timestamp: string;
}

// -- Union type --
export type EngineEvent =
  | SessionStartedEvent
  | SessionCompletedEvent
  | SessionExhaustedEvent
  | SessionFailedEvent
  | IterationStartedEvent
  | ModelResponseEvent
  | CodeExecutedEvent
  | CostUpdateEvent;
