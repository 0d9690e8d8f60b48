// packages/cli/src/commands/cost.ts — Cost and usage dashboard

import { CostStore, SessionStore } from '@rlm-engine/core';
import type { CostSummaryRow } from '@rlm-engine/core';

import { loadCliConfig, printJson, withDatabase } from '../utils.js';
import type { Db } from '../utils.js';

export type CostScope = 'session' | 'daily' | 'all';

export interface CostOptions {
  scope: CostScope;
  days: number;
  session?: string;
}

export interface CostReport {
  scope: string;
  totalCalls: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCostUsd: number;
  byModel: CostSummaryRow[];
  byDay?: Record<string, { calls: number; costUsd: number }>;
}

function totals(rows: CostSummaryRow[]): Omit<CostReport, 'scope' | 'byModel' | 'byDay'> {
  return {
    totalCalls: rows.reduce((n, r) => n + r.calls, 0),
    totalInputTokens: rows.reduce((n, r) => n + r.inputTokens, 0),
    totalOutputTokens: rows.reduce((n, r) => n + r.outputTokens, 0),
    totalCostUsd: rows.reduce((n, r) => n + r.costUsd, 0),
  };
}

/** Session scope without an id reports on the most recent session. */
export function buildCostReport(db: Db, options: CostOptions): CostReport {
  const costs = new CostStore(db);

  switch (options.scope) {
    case 'session': {
      const sessionId = options.session ?? new SessionStore(db).list({ limit: 1 })[0]?.id;
      if (!sessionId) {
        throw new Error('No sessions recorded yet. Run: rlm query');
      }
      if (!new SessionStore(db).get(sessionId)) {
        throw new Error(`Session not found: ${sessionId}`);
      }
      const byModel = costs.getSessionSummary(sessionId);
      return { scope: `session ${sessionId}`, ...totals(byModel), byModel };
    }

    case 'daily': {
      const daily = costs.getDailySummary(options.days);
      const byModel = new Map<string, CostSummaryRow>();
      const byDay: Record<string, { calls: number; costUsd: number }> = {};
      for (const row of daily) {
        const model = byModel.get(row.modelId) ?? {
          modelId: row.modelId,
          calls: 0,
          inputTokens: 0,
          outputTokens: 0,
          costUsd: 0,
        };
        model.calls += row.calls;
        model.inputTokens += row.inputTokens;
        model.outputTokens += row.outputTokens;
        model.costUsd += row.costUsd;
        byModel.set(row.modelId, model);

        const day = byDay[row.day] ?? { calls: 0, costUsd: 0 };
        day.calls += row.calls;
        day.costUsd += row.costUsd;
        byDay[row.day] = day;
      }
      const models = [...byModel.values()].sort((a, b) => b.costUsd - a.costUsd);
      return { scope: `last ${options.days} days`, ...totals(models), byModel: models, byDay };
    }

    case 'all': {
      const byModel = costs.getAllTimeSummary();
      return { scope: 'all-time', ...totals(byModel), byModel };
    }
  }
}

export async function costCommand(options: CostOptions): Promise<void> {
  const config = loadCliConfig();
  await withDatabase(config, (db) => {
    printJson(buildCostReport(db, options));
  });
}
