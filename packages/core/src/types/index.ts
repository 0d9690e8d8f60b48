// packages/core/src/types/index.ts -- barrel re-export

export type {
  ModelProvider,
  ModelVariant,
  ConfigLogLevel,
  PriceEntry,
  SandboxConfig,
  RetrySettings,
  ProviderCredentials,
  RlmConfig,
  RlmConfigOverrides,
} from './config.js';

export { ErrorCode, queryInputSchema, costInputSchema } from './mcp.js';
export type { QueryInput, CostInput } from './mcp.js';

export type {
  SessionStartedEvent,
  SessionCompletedEvent,
  SessionExhaustedEvent,
  SessionFailedEvent,
  IterationStartedEvent,
  ModelResponseEvent,
  CodeExecutedEvent,
  CostUpdateEvent,
  EngineEvent,
} from './events.js';

export type {
  StepKind,
  IterationStep,
  SessionStatus,
  TerminalStatus,
  SessionResult,
  SessionPayload,
  ContextInput,
  SessionRecord,
  StepRecord,
} from './session.js';

export type { CostLogEntry, CostSummaryRow } from './memory.js';

export type {
  ChatMessage,
  CallerTier,
  RecursionContext,
  InvokeRequest,
  MeteringSource,
  ModelInvocation,
  UsageRecord,
} from './models.js';

export type { NamespaceKind, NamespaceValue, ExecutionResult } from './sandbox.js';
