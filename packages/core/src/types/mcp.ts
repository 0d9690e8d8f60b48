// packages/core/src/types/mcp.ts — MCP tool input schemas

import { z } from 'zod';
import { DAYS_PER_YEAR, MCP_QUERY_MAX_LENGTH } from '../utils/constants.js';

export enum ErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  CONFIG_ERROR = 'CONFIG_ERROR',
  MODEL_UNAVAILABLE = 'MODEL_UNAVAILABLE',
  RATE_LIMITED = 'RATE_LIMITED',
  TIMEOUT = 'TIMEOUT',
  SANDBOX_ERROR = 'SANDBOX_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const queryInputSchema = z.object({
  query: z.string().min(1).max(MCP_QUERY_MAX_LENGTH),
  context: z.union([z.string(), z.array(z.string())]),
  rootModel: z.string().min(1).optional(),
  subModel: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().max(200).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  modelVariant: z.enum(['gpt', 'qwen']).optional(),
  includeTrajectory: z.boolean().optional().default(false),
});
export type QueryInput = z.infer<typeof queryInputSchema>;

export const costInputSchema = z.object({
  scope: z.enum(['session', 'daily', 'all']).optional().default('session'),
  sessionId: z.string().optional(),
  days: z.number().int().positive().max(DAYS_PER_YEAR).optional().default(30),
});
export type CostInput = z.infer<typeof costInputSchema>;
