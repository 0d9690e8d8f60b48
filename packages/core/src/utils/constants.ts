// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default cap on orchestration turns per session */
export const DEFAULT_MAX_ITERATIONS = 50;

/** Default max tokens for a single model response */
export const DEFAULT_MAX_OUTPUT_TOKENS = 16_384;

/** Default per-call model timeout in seconds */
export const DEFAULT_TIMEOUT_SEC = 600;

/** Default wall-clock ceiling for one sandbox execution in milliseconds */
export const DEFAULT_EXECUTION_TIMEOUT_MS = 600_000;

/** Default isolate heap ceiling in megabytes */
export const DEFAULT_SANDBOX_MEMORY_MB = 256;

/** Characters of captured output shown by display surfaces */
export const DEFAULT_DISPLAY_LIMIT = 5000;

/** Max preview length for a namespace value */
export const VARIABLE_PREVIEW_CHARS = 200;

/** Chunk lengths listed in the system prompt before eliding the rest */
export const PROMPT_CHUNK_LENGTHS_SHOWN = 100;

/** HTTP 429 Too Many Requests status code */
export const HTTP_TOO_MANY_REQUESTS = 429;

/** Absolute ceiling on provider call attempts */
export const MAX_PROVIDER_ATTEMPTS = 5;

/** Max query length accepted by the MCP query tool */
export const MCP_QUERY_MAX_LENGTH = 50_000;

/** Days in a year (for cost aggregation) */
export const DAYS_PER_YEAR = 365;
