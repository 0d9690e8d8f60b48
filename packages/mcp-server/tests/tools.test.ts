// packages/mcp-server/tests/tools.test.ts — MCP tool handler tests

import {
  ConfigError,
  CostStore,
  DEFAULT_CONFIG,
  ErrorCode,
  ModelError,
  Orchestrator,
  PriceTable,
  SandboxError,
  SessionStore,
  openDatabase,
} from '@rlm-engine/core';
import type { InvokeRequest, ModelClient, ModelInvocation, RlmConfig } from '@rlm-engine/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { handleCost } from '../src/tools/cost.js';
import { classifyError, toolError } from '../src/tools/errors.js';
import { handleQuery } from '../src/tools/query.js';
import { TOOL_DEFINITIONS } from '../src/server.js';

const config: RlmConfig = {
  ...DEFAULT_CONFIG,
  logLevel: 'silent',
  sandbox: { timeoutMs: 5000, memoryLimitMb: 64 },
};

class ScriptedClient implements ModelClient {
  readonly prices = new PriceTable();
  readonly requests: InvokeRequest[] = [];

  constructor(private readonly replies: string[]) {}

  async invoke(request: InvokeRequest): Promise<ModelInvocation> {
    this.requests.push(request);
    return {
      text: this.replies.shift() ?? 'Still thinking.',
      model: request.modelId,
      promptTokens: 1000,
      completionTokens: 100,
      costUsd: this.prices.cost(request.modelId, 1000, 100),
      durationMs: 1,
      meteringSource: 'sdk',
    };
  }
}

function textOf(result: { content: Array<{ type: 'text'; text: string }> }): string {
  return result.content[0]?.text ?? '';
}

describe('TOOL_DEFINITIONS', () => {
  it('exposes the query and cost tools', () => {
    expect(TOOL_DEFINITIONS.map((t) => t.name)).toEqual(['rlm_query', 'rlm_cost']);
    expect(TOOL_DEFINITIONS[0]?.inputSchema).toMatchObject({ required: ['query', 'context'] });
  });
});

describe('handleQuery', () => {
  it('returns the answer without the trajectory by default', async () => {
    const client = new ScriptedClient(['```repl\nvar n = context.length;\n```', 'FINAL_VAR(n)']);
    const orchestrator = new Orchestrator({ config, client });

    const result = await handleQuery(orchestrator, { query: 'How long?', context: 'abcdef' });
    const payload = JSON.parse(textOf(result));

    expect(payload.answer).toBe('6');
    expect(payload.success).toBe(true);
    expect(payload.iterations).toBe(2);
    expect(payload.session_id).toMatch(/^ses_/);
    expect(payload).not.toHaveProperty('trajectory');
    expect(payload.usage_summary.calls).toBe(2);
  });

  it('includes the trajectory on request', async () => {
    const client = new ScriptedClient(['FINAL(yes)']);
    const orchestrator = new Orchestrator({ config, client });

    const result = await handleQuery(orchestrator, {
      query: 'Is it there?',
      context: ['a', 'b'],
      includeTrajectory: true,
    });
    const payload = JSON.parse(textOf(result));

    expect(payload.trajectory).toEqual([{ iteration: 1, type: 'final', response: 'FINAL(yes)' }]);
  });

  it('passes model overrides to the session', async () => {
    const client = new ScriptedClient(['FINAL(ok)']);
    const orchestrator = new Orchestrator({ config, client });

    await handleQuery(orchestrator, {
      query: 'q',
      context: 'c',
      rootModel: 'gpt-5',
      maxIterations: 3,
      maxOutputTokens: 2048,
    });

    expect(client.requests[0]?.modelId).toBe('gpt-5');
    expect(client.requests[0]?.maxOutputTokens).toBe(2048);
  });

  it('rejects a non-positive output token cap', async () => {
    const orchestrator = new Orchestrator({ config, client: new ScriptedClient([]) });
    await expect(
      handleQuery(orchestrator, { query: 'q', context: 'c', maxOutputTokens: 0 }),
    ).rejects.toBeInstanceOf(ZodError);
  });

  it('rejects invalid input', async () => {
    const orchestrator = new Orchestrator({ config, client: new ScriptedClient([]) });
    await expect(handleQuery(orchestrator, { query: '', context: 'c' })).rejects.toBeInstanceOf(ZodError);
    await expect(handleQuery(orchestrator, { query: 'q' })).rejects.toBeInstanceOf(ZodError);
  });
});

describe('handleCost', () => {
  let db: ReturnType<typeof openDatabase>;
  let costStore: CostStore;
  let sessionId: string;

  beforeEach(() => {
    db = openDatabase(':memory:');
    costStore = new CostStore(db);
    sessionId = new SessionStore(db).create({
      query: 'q',
      contextType: 'string',
      contextLength: 1,
      config: DEFAULT_CONFIG,
    }).id;
    costStore.log({
      sessionId,
      iteration: 1,
      tier: 'root',
      depth: 0,
      modelId: 'gpt-4o',
      inputTokens: 1000,
      outputTokens: 100,
      costUsd: 0.0035,
      latencyMs: 5,
    });
  });

  afterEach(() => {
    db.close();
  });

  it('summarizes one session', async () => {
    const result = await handleCost(costStore, { scope: 'session', sessionId });
    expect(JSON.parse(textOf(result))).toEqual([
      { modelId: 'gpt-4o', calls: 1, inputTokens: 1000, outputTokens: 100, costUsd: 0.0035 },
    ]);
  });

  it('requires a session id for session scope', async () => {
    await expect(handleCost(costStore, {})).rejects.toThrow('sessionId is required');
  });

  it('summarizes all sessions', async () => {
    const result = await handleCost(costStore, { scope: 'all' });
    expect(JSON.parse(textOf(result))).toHaveLength(1);
  });

  it('rejects an out-of-range day count', async () => {
    await expect(handleCost(costStore, { scope: 'daily', days: 0 })).rejects.toBeInstanceOf(ZodError);
  });
});

describe('classifyError', () => {
  it('maps engine errors to error codes', () => {
    expect(classifyError(new ConfigError('bad', 'pricing'))).toBe(ErrorCode.CONFIG_ERROR);
    expect(classifyError(new ModelError('slow down', 'openai', 'gpt-4o', 429))).toBe(ErrorCode.RATE_LIMITED);
    expect(classifyError(new ModelError('down', 'openai', 'gpt-4o', 503))).toBe(ErrorCode.MODEL_UNAVAILABLE);
    expect(classifyError(new SandboxError('no isolate'))).toBe(ErrorCode.SANDBOX_ERROR);
    expect(classifyError(new Error('other'))).toBe(ErrorCode.INTERNAL_ERROR);
  });

  it('builds an error result', () => {
    const result = toolError(new ConfigError('Unknown model "x"', 'pricing'));
    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({ error: 'CONFIG_ERROR', message: 'Unknown model "x"' });
  });
});
