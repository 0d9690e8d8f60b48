// packages/core/src/memory/session-store.ts

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { RlmConfig } from '../types/config.js';
import type { UsageSummary } from '../types/models.js';
import type {
  IterationStep,
  SessionRecord,
  SessionStatus,
  StepKind,
  StepRecord,
  TerminalStatus,
} from '../types/session.js';
import { generateSessionId } from '../utils/id.js';

interface SessionRow {
  id: string;
  query: string;
  context_type: 'string' | 'list';
  context_length: number;
  root_model: string;
  sub_model: string;
  status: SessionStatus;
  answer: string | null;
  iterations: number;
  total_cost: number;
  error: string | null;
  config_snapshot: string;
  usage_summary: string | null;
  started_at: string;
  updated_at: string;
  completed_at: string | null;
}

interface StepRow {
  session_id: string;
  iteration: number;
  kind: StepKind;
  response: string;
  code: string | null;
  output: string | null;
  error: string | null;
  duration_ms: number;
  created_at: string;
}

const usageSummarySchema = z.object({
  models: z.array(
    z.object({
      modelId: z.string(),
      calls: z.number(),
      promptTokens: z.number(),
      completionTokens: z.number(),
      costUsd: z.number(),
    }),
  ),
  calls: z.number(),
  promptTokens: z.number(),
  completionTokens: z.number(),
  totalCost: z.number(),
});

function parseUsageSummary(json: string | null): UsageSummary | null {
  if (json === null) return null;
  const parsed = usageSummarySchema.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : null;
}

/** Secrets never reach the snapshot column. */
function snapshotConfig(config: RlmConfig): string {
  return JSON.stringify({ ...config, provider: {} });
}

export class SessionStore {
  constructor(private db: Database.Database) {}

  create(params: {
    id?: string;
    query: string;
    contextType: 'string' | 'list';
    contextLength: number;
    config: RlmConfig;
  }): SessionRecord {
    const id = params.id ?? generateSessionId();
    const now = new Date().toISOString();
    const configSnapshot = snapshotConfig(params.config);

    this.db
      .prepare(
        `INSERT INTO sessions (id, query, context_type, context_length, root_model, sub_model, status, config_snapshot, started_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, 'running', ?, ?, ?)`,
      )
      .run(
        id,
        params.query,
        params.contextType,
        params.contextLength,
        params.config.rootModel,
        params.config.subModel,
        configSnapshot,
        now,
        now,
      );

    return {
      id,
      query: params.query,
      contextType: params.contextType,
      contextLength: params.contextLength,
      rootModel: params.config.rootModel,
      subModel: params.config.subModel,
      status: 'running',
      answer: null,
      iterations: 0,
      totalCost: 0,
      error: null,
      configSnapshot,
      usageSummary: null,
      startedAt: now,
      updatedAt: now,
      completedAt: null,
    };
  }

  get(sessionId: string): SessionRecord | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(sessionId);
    return row ? this.rowToSession(row) : null;
  }

  list(filter?: { status?: SessionStatus; limit?: number }): SessionRecord[] {
    let sql = 'SELECT * FROM sessions WHERE 1=1';
    const params: Array<string | number> = [];

    if (filter?.status) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }
    sql += ' ORDER BY started_at DESC, rowid DESC';
    if (filter?.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }

    const rows = this.db.prepare<Array<string | number>, SessionRow>(sql).all(...params);
    return rows.map((r) => this.rowToSession(r));
  }

  appendStep(sessionId: string, step: IterationStep): void {
    this.db
      .prepare(
        `INSERT INTO session_steps (session_id, iteration, kind, response, code, output, error, duration_ms, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        sessionId,
        step.iteration,
        step.kind,
        step.response,
        step.code ?? null,
        step.output ?? null,
        step.error ?? null,
        step.durationMs,
        new Date().toISOString(),
      );
  }

  getSteps(sessionId: string): StepRecord[] {
    const rows = this.db
      .prepare<[string], StepRow>('SELECT * FROM session_steps WHERE session_id = ? ORDER BY iteration ASC')
      .all(sessionId);
    return rows.map((r) => ({
      sessionId: r.session_id,
      iteration: r.iteration,
      kind: r.kind,
      response: r.response,
      ...(r.code !== null ? { code: r.code } : {}),
      ...(r.output !== null ? { output: r.output } : {}),
      ...(r.error !== null ? { error: r.error } : {}),
      durationMs: r.duration_ms,
      createdAt: r.created_at,
    }));
  }

  updateProgress(sessionId: string, iterations: number, totalCost: number): void {
    this.db
      .prepare('UPDATE sessions SET iterations = ?, total_cost = ?, updated_at = ? WHERE id = ?')
      .run(iterations, totalCost, new Date().toISOString(), sessionId);
  }

  finish(
    sessionId: string,
    result: {
      status: TerminalStatus;
      answer: string;
      iterations: number;
      totalCost: number;
      usageSummary?: UsageSummary;
    },
  ): void {
    const now = new Date().toISOString();
    const usageSummary = result.usageSummary ? JSON.stringify(result.usageSummary) : null;
    this.db
      .prepare(
        `UPDATE sessions SET status = ?, answer = ?, iterations = ?, total_cost = ?, usage_summary = ?, completed_at = ?, updated_at = ? WHERE id = ?`,
      )
      .run(result.status, result.answer, result.iterations, result.totalCost, usageSummary, now, now, sessionId);
  }

  fail(sessionId: string, error: string, iterations: number, totalCost: number): void {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `UPDATE sessions SET status = 'failed', error = ?, iterations = ?, total_cost = ?, completed_at = ?, updated_at = ? WHERE id = ?`,
      )
      .run(error, iterations, totalCost, now, now, sessionId);
  }

  private rowToSession(row: SessionRow): SessionRecord {
    return {
      id: row.id,
      query: row.query,
      contextType: row.context_type,
      contextLength: row.context_length,
      rootModel: row.root_model,
      subModel: row.sub_model,
      status: row.status,
      answer: row.answer,
      iterations: row.iterations,
      totalCost: row.total_cost,
      error: row.error,
      configSnapshot: row.config_snapshot,
      usageSummary: parseUsageSummary(row.usage_summary),
      startedAt: row.started_at,
      updatedAt: row.updated_at,
      completedAt: row.completed_at,
    };
  }
}
