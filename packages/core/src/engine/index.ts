// packages/core/src/engine/index.ts -- barrel re-export

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, QueryOptions, SandboxFactory } from './orchestrator.js';
export { query } from './query.js';
export { toSessionPayload, truncateForDisplay } from './payload.js';
export { parseResponse, extractCodeBlocks, extractFinal } from './response-parser.js';
export type { ParsedResponse, FinalMarker } from './response-parser.js';
export { TrajectoryRecorder, summarizeUsage } from './trajectory.js';
export type { UsageSummary, ModelUsageLine, FinishedTrajectory } from './trajectory.js';
export { EventBus } from './event-bus.js';
export { CancellationToken, CancellationError } from './cancellation.js';
