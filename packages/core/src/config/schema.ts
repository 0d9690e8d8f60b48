// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { RlmConfig } from '../types/config.js';
import {
  DEFAULT_DISPLAY_LIMIT,
  DEFAULT_EXECUTION_TIMEOUT_MS,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_SANDBOX_MEMORY_MB,
  DEFAULT_TIMEOUT_SEC,
  MAX_PROVIDER_ATTEMPTS,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const modelProviderSchema = z.enum(['openai', 'anthropic']);

const priceEntrySchema = z.object({
  provider: modelProviderSchema,
  inputPer1M: z.number().nonnegative(),
  outputPer1M: z.number().nonnegative(),
});

const sandboxConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_EXECUTION_TIMEOUT_MS),
  // isolated-vm refuses heaps under 8 MB
  memoryLimitMb: z.number().int().min(8).default(DEFAULT_SANDBOX_MEMORY_MB),
});

const retrySettingsSchema = z.object({
  maxAttempts: z.number().int().positive().max(MAX_PROVIDER_ATTEMPTS).default(3),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  budgetMs: z.number().int().positive().default(DEFAULT_TIMEOUT_SEC * 1000),
});

const providerCredentialsSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  openaiBaseUrl: z.string().url().optional(),
  anthropicApiKey: z.string().min(1).optional(),
});

export const rlmConfigSchema = z
  .object({
    rootModel: z.string().min(1).default('gpt-4o'),
    subModel: z.string().min(1).default('gpt-4o-mini'),
    maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
    maxOutputTokens: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_TOKENS),
    maxRecursionDepth: z.number().int().min(0).max(1).default(1),
    modelVariant: z.enum(['gpt', 'qwen']).default('gpt'),
    instructions: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout: z.number().positive().default(DEFAULT_TIMEOUT_SEC),
    sandbox: sandboxConfigSchema.default({}),
    retry: retrySettingsSchema.default({}),
    pricing: z.record(z.string().min(1), priceEntrySchema).default({}),
    provider: providerCredentialsSchema.default({}),
    displayLimit: z.number().int().positive().default(DEFAULT_DISPLAY_LIMIT),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    database: z
      .object({
        path: z.string().min(1).default('.rlm/db/rlm.db'),
      })
      .default({}),
  })
  .strict();

export type RlmConfigInput = z.input<typeof rlmConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): RlmConfig {
  const result = rlmConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field || undefined);
  }
  return result.data;
}
