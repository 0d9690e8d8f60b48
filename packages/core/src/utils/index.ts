// packages/core/src/utils/index.ts -- barrel re-export

export { generateSessionId } from './id.js';
export { ConfigError, ModelError, SandboxError, DatabaseError } from './errors.js';
export {
  withCanonicalRetry,
  isRetryable,
  isRateLimit,
  parseRetryAfter,
  calculateBackoff,
} from './retry.js';
export type { RetryConfig, AttemptResult } from './retry.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep } from './sleep.js';
export * from './constants.js';
