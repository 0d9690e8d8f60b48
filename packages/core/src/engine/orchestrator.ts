// packages/core/src/engine/orchestrator.ts

import type Database from 'better-sqlite3';
import { EventEmitter } from 'eventemitter3';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { resolveConfig } from '../config/loader.js';
import { CostStore } from '../memory/cost-store.js';
import { SessionStore } from '../memory/session-store.js';
import { AiSdkModelClient } from '../models/client.js';
import type { ModelClient } from '../models/client.js';
import { PriceTable } from '../models/pricing.js';
import {
  CONTINUE_PROMPT,
  describeContext,
  executionFeedback,
  initialMessages,
} from '../prompts/system-prompt.js';
import { withInstructions } from '../prompts/agents.js';
import { IsolateSandbox } from '../sandbox/sandbox.js';
import type { Sandbox, SandboxOptions } from '../sandbox/sandbox.js';
import type { RlmConfig, RlmConfigOverrides } from '../types/config.js';
import type { EngineEvent } from '../types/events.js';
import type { CallerTier, ChatMessage, ModelInvocation, RecursionContext } from '../types/models.js';
import type { ExecutionResult } from '../types/sandbox.js';
import type { ContextInput, IterationStep, SessionResult, TerminalStatus } from '../types/session.js';
import { generateSessionId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { CancellationError } from './cancellation.js';
import type { CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { parseResponse } from './response-parser.js';
import type { FinalMarker } from './response-parser.js';
import { TrajectoryRecorder } from './trajectory.js';

interface OrchestratorEvents {
  event: (event: EngineEvent) => void;
}

type FinalResolution = { answer: string } | { miss: string };

export type SandboxFactory = (options: SandboxOptions) => Promise<Sandbox>;

export interface OrchestratorOptions {
  /** Resolved configuration. Defaults to the built-in defaults. */
  config?: RlmConfig;
  /** Model client. Built from the per-query config when omitted. */
  client?: ModelClient;
  createSandbox?: SandboxFactory;
  /** When given, sessions, steps and usage are persisted as they happen. */
  db?: Database.Database;
  logger?: Logger;
}

export interface QueryOptions {
  cancellation?: CancellationToken;
}

/** Mutable state of one running session. */
interface SessionState {
  id: string;
  config: RlmConfig;
  client: ModelClient;
  recorder: TrajectoryRecorder;
  logger: Logger;
  iteration: number;
  signal?: AbortSignal;
}

/**
 * Drives the generate / execute / feed-back loop. Concurrent `query` calls
 * are independent; each owns its sandbox.
 */
export class Orchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly config: RlmConfig;
  private readonly client: ModelClient | undefined;
  private readonly createSandbox: SandboxFactory;
  private readonly sessionStore: SessionStore | undefined;
  private readonly costStore: CostStore | undefined;
  private readonly logger: Logger | undefined;
  private readonly eventBus: EventBus;

  constructor(options: OrchestratorOptions = {}) {
    super();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.client = options.client;
    this.createSandbox = options.createSandbox ?? ((opts) => IsolateSandbox.create(opts));
    this.sessionStore = options.db ? new SessionStore(options.db) : undefined;
    this.costStore = options.db ? new CostStore(options.db) : undefined;
    this.logger = options.logger;
    this.eventBus = new EventBus();

    // Forward all events from eventBus to this orchestrator
    this.eventBus.on('event', (event) => this.emit('event', event));
  }

  /**
   * Answer `query` over `context`. Resolves with a SessionResult on completion
   * or exhaustion; rejects on configuration, provider, sandbox or cancellation faults.
   */
  async query(
    query: string,
    context: ContextInput,
    overrides?: RlmConfigOverrides,
    options?: QueryOptions,
  ): Promise<SessionResult> {
    // INIT: everything that can fail closed happens before the first model call
    const config = resolveConfig(this.config, overrides);
    const client = this.client ?? this.buildClient(config);
    client.prices.assertKnown(config.rootModel, config.subModel);

    const cancellation = options?.cancellation;
    const shape = describeContext(context);
    const state: SessionState = {
      id: generateSessionId(),
      config,
      client,
      recorder: new TrajectoryRecorder(),
      logger: (this.logger ?? createLogger(config.logLevel)).child('orchestrator'),
      iteration: 0,
      signal: cancellation?.signal,
    };
    const startTime = Date.now();

    this.sessionStore?.create({
      id: state.id,
      query,
      contextType: shape.contextType,
      contextLength: shape.totalLength,
      config,
    });
    state.logger.info(
      `Session ${state.id} started: root=${config.rootModel} sub=${config.subModel} maxIterations=${config.maxIterations}`,
    );
    this.eventBus.emitEvent({
      type: 'session.started',
      sessionId: state.id,
      query,
      rootModel: config.rootModel,
      subModel: config.subModel,
      maxIterations: config.maxIterations,
      timestamp: '',
    });

    const onCancelled = (): void => {
      state.logger.warn(`Session ${state.id}: cancellation requested at iteration ${state.iteration}`);
    };
    cancellation?.onCancel(onCancelled);

    let sandbox: Sandbox | undefined;
    try {
      cancellation?.throwIfCancelled();
      sandbox = await this.createSandbox({
        context,
        depth: 0,
        maxRecursionDepth: config.maxRecursionDepth,
        onQuery: (prompt) => this.subQuery(state, prompt),
        timeoutMs: config.sandbox.timeoutMs,
        memoryLimitMb: config.sandbox.memoryLimitMb,
        logger: state.logger.child('sandbox'),
      });

      const messages: ChatMessage[] = initialMessages(withInstructions(query, config.instructions), {
        ...shape,
        modelVariant: config.modelVariant,
        allowSubCalls: config.maxRecursionDepth >= 1,
      });
      const rootRecursion: RecursionContext = { depth: 0, callerTier: 'root' };
      let bestPartial: string | undefined;

      // GENERATING → (EXECUTING →)* until a sole FINAL or the cap
      while (state.iteration < config.maxIterations) {
        cancellation?.throwIfCancelled();
        state.iteration++;
        const turnStart = Date.now();
        this.eventBus.emitEvent({
          type: 'iteration.started',
          sessionId: state.id,
          iteration: state.iteration,
          maxIterations: config.maxIterations,
          timestamp: '',
        });
        state.logger.debug(`Iteration ${state.iteration}/${config.maxIterations}`);

        const reply = await client.invoke({
          modelId: config.rootModel,
          messages,
          maxOutputTokens: config.maxOutputTokens,
          recursion: rootRecursion,
          temperature: config.temperature,
          signal: state.signal,
        });
        this.trackUsage(state, reply, 'root', rootRecursion.depth);
        this.eventBus.emitEvent({
          type: 'model.response',
          sessionId: state.id,
          iteration: state.iteration,
          model: reply.model,
          text: reply.text,
          durationMs: reply.durationMs,
          timestamp: '',
        });
        messages.push({ role: 'assistant', content: reply.text });

        const parsed = parseResponse(reply.text);

        if (parsed.codeBlocks.length > 0) {
          // Instruction blocks win over a FINAL in the same response
          const execution = await this.runBlocks(sandbox, parsed.codeBlocks);
          if (execution.fault) throw execution.fault;
          if (parsed.final) {
            const resolved = await this.resolveFinal(sandbox, parsed.final);
            if ('answer' in resolved) bestPartial = resolved.answer;
          }

          const code = parsed.codeBlocks.join('\n\n');
          this.recordStep(state, {
            iteration: state.iteration,
            kind: 'execution',
            response: reply.text,
            code,
            output: execution.output,
            ...(execution.error !== undefined ? { error: execution.error } : {}),
            durationMs: Date.now() - turnStart,
          });
          this.eventBus.emitEvent({
            type: 'code.executed',
            sessionId: state.id,
            iteration: state.iteration,
            code,
            output: execution.output,
            error: execution.error,
            durationMs: execution.durationMs,
            timestamp: '',
          });
          if (execution.error) {
            state.logger.warn(`Iteration ${state.iteration}: execution error: ${execution.error}`);
          }
          messages.push({ role: 'user', content: executionFeedback(execution.output, execution.error) });
          continue;
        }

        if (parsed.final) {
          const resolved = await this.resolveFinal(sandbox, parsed.final);
          if ('answer' in resolved) {
            this.recordStep(state, {
              iteration: state.iteration,
              kind: 'final',
              response: reply.text,
              durationMs: Date.now() - turnStart,
            });
            return this.finishSession(state, 'completed', resolved.answer, startTime);
          }

          const error = resolved.miss;
          state.logger.warn(`Iteration ${state.iteration}: ${error}`);
          this.recordStep(state, {
            iteration: state.iteration,
            kind: 'response',
            response: reply.text,
            error,
            durationMs: Date.now() - turnStart,
          });
          messages.push({ role: 'user', content: `Error: ${error}\n${CONTINUE_PROMPT}` });
          continue;
        }

        // Neither code nor a marker: informational turn
        this.recordStep(state, {
          iteration: state.iteration,
          kind: 'response',
          response: reply.text,
          durationMs: Date.now() - turnStart,
        });
        messages.push({ role: 'user', content: CONTINUE_PROMPT });
      }

      return this.finishSession(state, 'exhausted', bestPartial ?? '', startTime);
    } catch (err) {
      const failure =
        cancellation?.isCancelled && !(err instanceof CancellationError)
          ? new CancellationError('Session was cancelled')
          : err instanceof Error
            ? err
            : new Error(String(err));
      this.failSession(state, failure);
      throw failure;
    } finally {
      cancellation?.offCancel(onCancelled);
      sandbox?.dispose();
    }
  }

  private buildClient(config: RlmConfig): ModelClient {
    return new AiSdkModelClient({
      prices: new PriceTable(config.pricing),
      credentials: config.provider,
      retry: config.retry,
      timeout: config.timeout,
      logger: createLogger(config.logLevel, 'models'),
    });
  }

  /** Host side of llm_query: a plain completion on the sub model, one level down. */
  private async subQuery(state: SessionState, prompt: string): Promise<string> {
    const recursion: RecursionContext = { depth: 1, callerTier: 'root' };
    const call = await state.client.invoke({
      modelId: state.config.subModel,
      messages: [{ role: 'user', content: prompt }],
      maxOutputTokens: state.config.maxOutputTokens,
      recursion,
      temperature: state.config.temperature,
      signal: state.signal,
    });
    this.trackUsage(state, call, 'sub', recursion.depth);
    state.logger.debug(`llm_query on ${call.model}: ${call.promptTokens} in / ${call.completionTokens} out`);
    return call.text;
  }

  /** Run blocks in order, stopping at the first error or provider fault. */
  private async runBlocks(sandbox: Sandbox, blocks: string[]): Promise<ExecutionResult> {
    let output = '';
    let durationMs = 0;
    for (const code of blocks) {
      const result = await sandbox.execute(code);
      output += result.output;
      durationMs += result.durationMs;
      if (result.fault || result.error !== undefined) {
        return { output, error: result.error, durationMs, fault: result.fault };
      }
    }
    return { output, durationMs };
  }

  /** The answer a marker carries, or why a FINAL_VAR carries none. */
  private async resolveFinal(sandbox: Sandbox, marker: FinalMarker): Promise<FinalResolution> {
    if (marker.kind === 'answer') return { answer: marker.text };
    const value = await sandbox.getVariable(marker.name);
    if (!value) {
      return { miss: `FINAL_VAR(${marker.name}): no variable named "${marker.name}" is bound in the REPL` };
    }
    if (value.kind === 'null') {
      return { miss: `FINAL_VAR(${marker.name}): variable "${marker.name}" holds ${value.preview}, not an answer` };
    }
    return { answer: value.preview };
  }

  private trackUsage(state: SessionState, call: ModelInvocation, tier: CallerTier, depth: number): void {
    const total = state.recorder.recordUsage({
      modelId: call.model,
      tier,
      depth,
      iteration: state.iteration,
      promptTokens: call.promptTokens,
      completionTokens: call.completionTokens,
      costUsd: call.costUsd,
      durationMs: call.durationMs,
    });
    this.costStore?.log({
      sessionId: state.id,
      iteration: state.iteration,
      tier,
      depth,
      modelId: call.model,
      inputTokens: call.promptTokens,
      outputTokens: call.completionTokens,
      costUsd: call.costUsd,
      latencyMs: call.durationMs,
    });
    this.eventBus.emitEvent({
      type: 'cost.update',
      sessionId: state.id,
      model: call.model,
      tier,
      inputTokens: call.promptTokens,
      outputTokens: call.completionTokens,
      costUsd: call.costUsd,
      cumulativeSessionCost: total,
      timestamp: '',
    });
  }

  private recordStep(state: SessionState, step: IterationStep): void {
    state.recorder.record(step);
    if (this.sessionStore) {
      this.sessionStore.appendStep(state.id, step);
      this.sessionStore.updateProgress(state.id, state.iteration, state.recorder.totalCost);
    }
  }

  private finishSession(
    state: SessionState,
    status: TerminalStatus,
    answer: string,
    startTime: number,
  ): SessionResult {
    const trajectory = state.recorder.finish();
    const usageSummary = state.recorder.summary();
    const durationMs = Date.now() - startTime;
    const result: SessionResult = Object.freeze({
      sessionId: state.id,
      answer,
      success: status === 'completed',
      status,
      iterations: state.iteration,
      totalCost: trajectory.totalCost,
      usage: trajectory.usage,
      usageSummary,
      trajectory: trajectory.steps,
    });

    this.sessionStore?.finish(state.id, {
      status,
      answer,
      iterations: state.iteration,
      totalCost: trajectory.totalCost,
      usageSummary,
    });

    if (status === 'completed') {
      state.logger.info(
        `Session ${state.id} completed in ${state.iteration} iteration(s), $${trajectory.totalCost.toFixed(4)}`,
      );
      this.eventBus.emitEvent({
        type: 'session.completed',
        sessionId: state.id,
        answer,
        iterations: state.iteration,
        totalCost: trajectory.totalCost,
        durationMs,
        timestamp: '',
      });
    } else {
      state.logger.info(
        `Session ${state.id} exhausted after ${state.iteration} iteration(s), $${trajectory.totalCost.toFixed(4)}`,
      );
      this.eventBus.emitEvent({
        type: 'session.exhausted',
        sessionId: state.id,
        partialAnswer: answer,
        iterations: state.iteration,
        totalCost: trajectory.totalCost,
        durationMs,
        timestamp: '',
      });
    }
    return result;
  }

  private failSession(state: SessionState, error: Error): void {
    state.recorder.finish();
    state.logger.error(`Session ${state.id} failed at iteration ${state.iteration}: ${error.message}`);
    this.sessionStore?.fail(state.id, error.message, state.iteration, state.recorder.totalCost);
    this.eventBus.emitEvent({
      type: 'session.failed',
      sessionId: state.id,
      error: error.message,
      iteration: state.iteration,
      timestamp: '',
    });
  }
}
