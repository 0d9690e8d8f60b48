// packages/mcp-server/src/tools/query.ts — rlm_query tool handler

import { queryInputSchema, toSessionPayload } from '@rlm-engine/core';
import type { CancellationToken, Orchestrator } from '@rlm-engine/core';

export async function handleQuery(orchestrator: Orchestrator, args: unknown, cancellationToken?: CancellationToken) {
  const input = queryInputSchema.parse(args);
  const result = await orchestrator.query(
    input.query,
    input.context,
    {
      rootModel: input.rootModel,
      subModel: input.subModel,
      maxIterations: input.maxIterations,
      maxOutputTokens: input.maxOutputTokens,
      modelVariant: input.modelVariant,
    },
    { cancellation: cancellationToken },
  );

  const { trajectory, ...summary } = toSessionPayload(result);
  const payload = input.includeTrajectory
    ? { session_id: result.sessionId, ...summary, trajectory }
    : { session_id: result.sessionId, ...summary };

  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
  };
}
