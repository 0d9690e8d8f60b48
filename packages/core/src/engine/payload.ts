// packages/core/src/engine/payload.ts — Caller-facing serialization of a session result

import type { SessionPayload, SessionResult } from '../types/session.js';

export function toSessionPayload(result: SessionResult): SessionPayload {
  return {
    answer: result.answer,
    success: result.success,
    iterations: result.iterations,
    total_cost: result.totalCost,
    usage_summary: {
      calls: result.usageSummary.calls,
      prompt_tokens: result.usageSummary.promptTokens,
      completion_tokens: result.usageSummary.completionTokens,
      total_cost: result.usageSummary.totalCost,
      models: result.usageSummary.models.map((m) => ({
        model: m.modelId,
        calls: m.calls,
        prompt_tokens: m.promptTokens,
        completion_tokens: m.completionTokens,
        cost: m.costUsd,
      })),
    },
    trajectory: result.trajectory.map((step) => ({
      iteration: step.iteration,
      type: step.kind,
      ...(step.code !== undefined ? { code: step.code } : {}),
      response: step.response,
      ...(step.output !== undefined ? { output: step.output } : {}),
      ...(step.error !== undefined ? { error: step.error } : {}),
    })),
  };
}

/** Cut `text` to `limit` characters for display, noting how much was dropped. */
export function truncateForDisplay(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}\n... [${text.length - limit} more characters]`;
}
