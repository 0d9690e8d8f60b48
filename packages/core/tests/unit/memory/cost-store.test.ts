import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { CostStore } from '../../../src/memory/cost-store.js';
import { openDatabase } from '../../../src/memory/database.js';
import { SessionStore } from '../../../src/memory/session-store.js';

let db: Database.Database;
let costs: CostStore;
let sessionId: string;

beforeEach(() => {
  db = openDatabase(':memory:');
  costs = new CostStore(db);
  sessionId = new SessionStore(db).create({
    query: 'q',
    contextType: 'string',
    contextLength: 10,
    config: DEFAULT_CONFIG,
  }).id;
});

afterEach(() => {
  db.close();
});

function logCall(modelId: string, costUsd: number, tier: 'root' | 'sub' = 'root', session = sessionId) {
  return costs.log({
    sessionId: session,
    iteration: 1,
    tier,
    depth: tier === 'root' ? 0 : 1,
    modelId,
    inputTokens: 100,
    outputTokens: 20,
    costUsd,
    latencyMs: 50,
  });
}

describe('CostStore', () => {
  it('logs entries and reads them back in order', () => {
    const first = logCall('gpt-4o', 0.5);
    const second = logCall('gpt-4o-mini', 0.1, 'sub');
    expect(second).toBeGreaterThan(first);

    const entries = costs.getBySession(sessionId);
    expect(entries).toHaveLength(2);
    expect(entries[1]).toMatchObject({ modelId: 'gpt-4o-mini', tier: 'sub', depth: 1, costUsd: 0.1 });
  });

  it('requires an existing session', () => {
    expect(() => logCall('gpt-4o', 0.1, 'root', 'ses_missing')).toThrow();
  });

  it('summarizes a session per model, most expensive first', () => {
    logCall('gpt-4o-mini', 0.1, 'sub');
    logCall('gpt-4o', 0.5);
    logCall('gpt-4o-mini', 0.1, 'sub');

    const summary = costs.getSessionSummary(sessionId);
    expect(summary.map((r) => r.modelId)).toEqual(['gpt-4o', 'gpt-4o-mini']);
    expect(summary[1]?.calls).toBe(2);
    expect(summary[1]?.inputTokens).toBe(200);
    expect(summary[1]?.costUsd).toBeCloseTo(0.2, 10);
  });

  it('summarizes across sessions', () => {
    const other = new SessionStore(db).create({
      query: 'q2',
      contextType: 'list',
      contextLength: 4,
      config: DEFAULT_CONFIG,
    }).id;
    logCall('gpt-4o', 0.5);
    logCall('gpt-4o', 0.25, 'root', other);

    const all = costs.getAllTimeSummary();
    expect(all).toHaveLength(1);
    expect(all[0]?.calls).toBe(2);
    expect(all[0]?.costUsd).toBeCloseTo(0.75, 10);
  });

  it('groups recent usage by day', () => {
    logCall('gpt-4o', 0.5);
    const today = new Date().toISOString().slice(0, 10);

    const daily = costs.getDailySummary(7);
    expect(daily).toHaveLength(1);
    expect(daily[0]?.day).toBe(today);
    expect(daily[0]?.modelId).toBe('gpt-4o');
  });
});
