import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { openDatabase } from '../../../src/memory/database.js';
import { SessionStore } from '../../../src/memory/session-store.js';

let db: Database.Database;
let store: SessionStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SessionStore(db);
});

afterEach(() => {
  db.close();
});

function createSession(query = 'Which city?') {
  return store.create({ query, contextType: 'string', contextLength: 120, config: DEFAULT_CONFIG });
}

describe('SessionStore', () => {
  it('creates a running session with a generated ID', () => {
    const session = createSession();
    expect(session.id).toMatch(/^ses_/);
    expect(session.status).toBe('running');
    expect(session.rootModel).toBe('gpt-4o');
    expect(session.subModel).toBe('gpt-4o-mini');
    expect(session.totalCost).toBe(0);
  });

  it('round-trips through get()', () => {
    const created = createSession('Count the names');
    expect(store.get(created.id)).toEqual(created);
    expect(store.get('ses_missing')).toBeNull();
  });

  it('keeps credentials out of the config snapshot', () => {
    const session = store.create({
      query: 'q',
      contextType: 'list',
      contextLength: 3,
      config: { ...DEFAULT_CONFIG, provider: { openaiApiKey: 'test-secret' } },
    });
    expect(session.configSnapshot).not.toContain('test-secret');
    expect(JSON.parse(session.configSnapshot).provider).toEqual({});
  });

  it('appends steps and reads them back in order', () => {
    const session = createSession();
    store.appendStep(session.id, {
      iteration: 1,
      kind: 'execution',
      response: '```repl\nprint(1)\n```',
      code: 'print(1)',
      output: '1\n',
      durationMs: 12,
    });
    store.appendStep(session.id, { iteration: 2, kind: 'final', response: 'FINAL(1)', durationMs: 3 });

    const steps = store.getSteps(session.id);
    expect(steps.map((s) => s.kind)).toEqual(['execution', 'final']);
    expect(steps[0]?.code).toBe('print(1)');
    expect(steps[0]?.output).toBe('1\n');
    expect(steps[1]).not.toHaveProperty('code');
  });

  it('rejects a second step for the same iteration', () => {
    const session = createSession();
    store.appendStep(session.id, { iteration: 1, kind: 'response', response: 'a', durationMs: 0 });
    expect(() =>
      store.appendStep(session.id, { iteration: 1, kind: 'response', response: 'b', durationMs: 0 }),
    ).toThrow();
  });

  it('finishes a session with its answer', () => {
    const session = createSession();
    store.updateProgress(session.id, 2, 0.01);
    expect(store.get(session.id)?.iterations).toBe(2);

    store.finish(session.id, { status: 'completed', answer: 'Paris', iterations: 3, totalCost: 0.02 });
    const finished = store.get(session.id);
    expect(finished?.status).toBe('completed');
    expect(finished?.answer).toBe('Paris');
    expect(finished?.iterations).toBe(3);
    expect(finished?.totalCost).toBe(0.02);
    expect(finished?.completedAt).not.toBeNull();
    expect(finished?.usageSummary).toBeNull();
  });

  it('stores the usage summary of a finished session', () => {
    const session = createSession();
    const usageSummary = {
      models: [{ modelId: 'gpt-4o', calls: 2, promptTokens: 2000, completionTokens: 200, costUsd: 0.007 }],
      calls: 2,
      promptTokens: 2000,
      completionTokens: 200,
      totalCost: 0.007,
    };

    store.finish(session.id, { status: 'completed', answer: 'Paris', iterations: 2, totalCost: 0.007, usageSummary });

    expect(store.get(session.id)?.usageSummary).toEqual(usageSummary);
  });

  it('marks a failed session with its error', () => {
    const session = createSession();
    store.fail(session.id, 'provider down', 4, 0.5);
    const failed = store.get(session.id);
    expect(failed?.status).toBe('failed');
    expect(failed?.error).toBe('provider down');
    expect(failed?.answer).toBeNull();
  });

  it('lists newest first with status filter and limit', () => {
    const a = createSession('a');
    const b = createSession('b');
    const c = createSession('c');
    store.finish(b.id, { status: 'exhausted', answer: '', iterations: 50, totalCost: 1 });

    expect(store.list().map((s) => s.id)).toEqual([c.id, b.id, a.id]);
    expect(store.list({ status: 'running' }).map((s) => s.id)).toEqual([c.id, a.id]);
    expect(store.list({ limit: 1 }).map((s) => s.id)).toEqual([c.id]);
  });
});
