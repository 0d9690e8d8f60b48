// packages/mcp-server/src/tools/errors.ts — Map thrown errors to tool results

import { CancellationError, ConfigError, ErrorCode, ModelError, SandboxError } from '@rlm-engine/core';
import { ZodError } from 'zod';

export function classifyError(err: unknown): ErrorCode {
  if (err instanceof ZodError) return ErrorCode.INVALID_INPUT;
  if (err instanceof ConfigError) return ErrorCode.CONFIG_ERROR;
  if (err instanceof ModelError) {
    if (err.isRateLimit) return ErrorCode.RATE_LIMITED;
    if (err.isTimeout) return ErrorCode.TIMEOUT;
    return ErrorCode.MODEL_UNAVAILABLE;
  }
  if (err instanceof SandboxError) return ErrorCode.SANDBOX_ERROR;
  if (err instanceof CancellationError) return ErrorCode.TIMEOUT;
  return ErrorCode.INTERNAL_ERROR;
}

export function toolError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify({ error: classifyError(err), message }) }],
    isError: true,
  };
}
