// packages/mcp-server/src/tools/cost.ts — rlm_cost tool handler

import { costInputSchema } from '@rlm-engine/core';
import type { CostStore } from '@rlm-engine/core';

export async function handleCost(costStore: CostStore, args: unknown) {
  const input = costInputSchema.parse(args);
  let result: unknown;

  switch (input.scope) {
    case 'session': {
      if (!input.sessionId) {
        throw new Error('sessionId is required for session scope');
      }
      result = costStore.getSessionSummary(input.sessionId);
      break;
    }
    case 'daily': {
      result = costStore.getDailySummary(input.days);
      break;
    }
    case 'all': {
      result = costStore.getAllTimeSummary();
      break;
    }
  }

  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
  };
}
