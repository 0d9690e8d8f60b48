// @rlm-engine/core - Recursive context-query engine
// Orchestrator loop + V8 isolate sandbox + AI SDK model client + SQLite session log

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  ModelProvider,
  ModelVariant,
  ConfigLogLevel,
  PriceEntry,
  SandboxConfig,
  RetrySettings,
  ProviderCredentials,
  RlmConfig,
  RlmConfigOverrides,
  // Events
  SessionStartedEvent,
  SessionCompletedEvent,
  SessionExhaustedEvent,
  SessionFailedEvent,
  IterationStartedEvent,
  ModelResponseEvent,
  CodeExecutedEvent,
  CostUpdateEvent,
  EngineEvent,
  // Session
  StepKind,
  IterationStep,
  SessionStatus,
  TerminalStatus,
  SessionResult,
  SessionPayload,
  ContextInput,
  SessionRecord,
  StepRecord,
  // Memory
  CostLogEntry,
  CostSummaryRow,
  // Models
  ChatMessage,
  CallerTier,
  RecursionContext,
  InvokeRequest,
  MeteringSource,
  ModelInvocation,
  UsageRecord,
  // Sandbox
  NamespaceKind,
  NamespaceValue,
  ExecutionResult,
  // MCP types
  QueryInput,
  CostInput,
} from './types/index.js';

export { ErrorCode, queryInputSchema, costInputSchema } from './types/index.js';

// Utilities
export {
  generateSessionId,
  ConfigError,
  ModelError,
  SandboxError,
  DatabaseError,
  withCanonicalRetry,
  isRetryable,
  isRateLimit,
  parseRetryAfter,
  calculateBackoff,
  createLogger,
  sleep,
} from './utils/index.js';
export type { RetryConfig, AttemptResult, Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TIMEOUT_SEC,
  DEFAULT_EXECUTION_TIMEOUT_MS,
  DEFAULT_SANDBOX_MEMORY_MB,
  DEFAULT_DISPLAY_LIMIT,
  VARIABLE_PREVIEW_CHARS,
  HTTP_TOO_MANY_REQUESTS,
  MAX_PROVIDER_ATTEMPTS,
  MCP_QUERY_MAX_LENGTH,
  DAYS_PER_YEAR,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  rlmConfigSchema,
  validateConfig,
  loadConfig,
  resolveConfig,
  configFromEnv,
  CONFIG_FILENAME,
} from './config/index.js';
export type { RlmConfigInput } from './config/index.js';

// Memory / Database
export { openDatabase, runMigrations, getSchemaVersion, SessionStore, CostStore } from './memory/index.js';
export type { DailyCostRow } from './memory/index.js';

// Model invocation (Vercel AI SDK)
export { AiSdkModelClient, createProviderResolver, PriceTable, estimateTokens } from './models/index.js';
export type { ModelClient, ModelResolver, AiSdkModelClientOptions } from './models/index.js';

// Sandbox
export { IsolateSandbox, CONTEXT_BINDING, isIdentifier } from './sandbox/index.js';
export type { Sandbox, SandboxOptions } from './sandbox/index.js';

// Prompts
export {
  buildSystemPrompt,
  describeContext,
  initialMessages,
  executionFeedback,
  CONTINUE_PROMPT,
} from './prompts/system-prompt.js';
export type { ContextShape, SystemPromptOptions } from './prompts/system-prompt.js';
export { AGENT_PRESETS, AGENT_NAMES, agentOverrides, isAgentName, withInstructions } from './prompts/agents.js';
export type { AgentName, AgentPreset } from './prompts/agents.js';

// Engine
export {
  Orchestrator,
  query,
  toSessionPayload,
  truncateForDisplay,
  parseResponse,
  extractCodeBlocks,
  extractFinal,
  TrajectoryRecorder,
  summarizeUsage,
  EventBus,
  CancellationToken,
  CancellationError,
} from './engine/index.js';
export type {
  OrchestratorOptions,
  QueryOptions,
  SandboxFactory,
  ParsedResponse,
  FinalMarker,
  UsageSummary,
  ModelUsageLine,
  FinishedTrajectory,
} from './engine/index.js';
