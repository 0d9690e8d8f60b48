// packages/core/src/memory/cost-store.ts

import type Database from 'better-sqlite3';
import type { CostLogEntry, CostSummaryRow } from '../types/memory.js';

export interface DailyCostRow {
  day: string;
  modelId: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  calls: number;
}

interface CostRow {
  id: number;
  session_id: string;
  iteration: number;
  tier: 'root' | 'sub';
  depth: number;
  model_id: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  latency_ms: number;
  created_at: string;
}

interface SummaryRow {
  model_id: string;
  calls: number;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
}

interface DailyRow extends SummaryRow {
  day: string;
}

const SUMMARY_COLUMNS = `model_id, COUNT(*) AS calls,
        SUM(input_tokens) AS input_tokens,
        SUM(output_tokens) AS output_tokens,
        SUM(cost_usd) AS cost_usd`;

function toSummary(row: SummaryRow): CostSummaryRow {
  return {
    modelId: row.model_id,
    calls: row.calls,
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    costUsd: row.cost_usd,
  };
}

export class CostStore {
  constructor(private db: Database.Database) {}

  log(entry: Omit<CostLogEntry, 'id' | 'createdAt'>): number {
    const result = this.db
      .prepare(
        `INSERT INTO cost_log (session_id, iteration, tier, depth, model_id, input_tokens, output_tokens, cost_usd, latency_ms, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.sessionId,
        entry.iteration,
        entry.tier,
        entry.depth,
        entry.modelId,
        entry.inputTokens,
        entry.outputTokens,
        entry.costUsd,
        entry.latencyMs,
        new Date().toISOString(),
      );
    return Number(result.lastInsertRowid);
  }

  getBySession(sessionId: string): CostLogEntry[] {
    const rows = this.db
      .prepare<[string], CostRow>('SELECT * FROM cost_log WHERE session_id = ? ORDER BY id ASC')
      .all(sessionId);
    return rows.map((r) => this.rowToEntry(r));
  }

  getSessionSummary(sessionId: string): CostSummaryRow[] {
    return this.db
      .prepare<[string], SummaryRow>(
        `SELECT ${SUMMARY_COLUMNS}
      FROM cost_log WHERE session_id = ?
      GROUP BY model_id ORDER BY cost_usd DESC`,
      )
      .all(sessionId)
      .map(toSummary);
  }

  getAllTimeSummary(): CostSummaryRow[] {
    return this.db
      .prepare<[], SummaryRow>(
        `SELECT ${SUMMARY_COLUMNS}
      FROM cost_log GROUP BY model_id ORDER BY cost_usd DESC`,
      )
      .all()
      .map(toSummary);
  }

  getDailySummary(days = 30): DailyCostRow[] {
    return this.db
      .prepare<[string], DailyRow>(
        `SELECT DATE(created_at) AS day, ${SUMMARY_COLUMNS}
      FROM cost_log WHERE created_at >= DATE('now', ? || ' days')
      GROUP BY day, model_id ORDER BY day DESC, cost_usd DESC`,
      )
      .all(`-${days}`)
      .map((r) => ({ day: r.day, ...toSummary(r) }));
  }

  private rowToEntry(row: CostRow): CostLogEntry {
    return {
      id: row.id,
      sessionId: row.session_id,
      iteration: row.iteration,
      tier: row.tier,
      depth: row.depth,
      modelId: row.model_id,
      inputTokens: row.input_tokens,
      outputTokens: row.output_tokens,
      costUsd: row.cost_usd,
      latencyMs: row.latency_ms,
      createdAt: row.created_at,
    };
  }
}
