// packages/core/src/config/defaults.ts

import type { RlmConfig } from '../types/config.js';
import {
  DEFAULT_DISPLAY_LIMIT,
  DEFAULT_EXECUTION_TIMEOUT_MS,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_SANDBOX_MEMORY_MB,
  DEFAULT_TIMEOUT_SEC,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: RlmConfig = {
  rootModel: 'gpt-4o',
  subModel: 'gpt-4o-mini',
  maxIterations: DEFAULT_MAX_ITERATIONS,
  maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
  maxRecursionDepth: 1,
  modelVariant: 'gpt',
  timeout: DEFAULT_TIMEOUT_SEC,
  sandbox: {
    timeoutMs: DEFAULT_EXECUTION_TIMEOUT_MS,
    memoryLimitMb: DEFAULT_SANDBOX_MEMORY_MB,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    budgetMs: DEFAULT_TIMEOUT_SEC * 1000,
  },
  pricing: {},
  provider: {},
  displayLimit: DEFAULT_DISPLAY_LIMIT,
  logLevel: 'info',
  database: {
    path: '.rlm/db/rlm.db',
  },
};
