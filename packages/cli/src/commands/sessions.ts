// packages/cli/src/commands/sessions.ts — rlm sessions / rlm show

import { CostStore, SessionStore, truncateForDisplay } from '@rlm-engine/core';
import type { SessionRecord, SessionStatus } from '@rlm-engine/core';

import { loadCliConfig, printJson, withDatabase } from '../utils.js';
import type { Db } from '../utils.js';

const QUERY_PREVIEW_CHARS = 80;

export interface SessionsOptions {
  status?: SessionStatus;
  limit: number;
}

function preview(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function summarizeSession(s: SessionRecord) {
  return {
    sessionId: s.id,
    query: preview(s.query, QUERY_PREVIEW_CHARS),
    status: s.status,
    iterations: s.iterations,
    totalCost: s.totalCost,
    rootModel: s.rootModel,
    subModel: s.subModel,
    startedAt: s.startedAt,
    completedAt: s.completedAt,
  };
}

export function listSessions(db: Db, options: SessionsOptions) {
  return new SessionStore(db).list({ status: options.status, limit: options.limit }).map(summarizeSession);
}

/** Full record of one session, or null when the id is unknown. */
export function describeSession(db: Db, sessionId: string, displayLimit: number) {
  const store = new SessionStore(db);
  const session = store.get(sessionId);
  if (!session) return null;

  return {
    ...summarizeSession(session),
    query: session.query,
    contextType: session.contextType,
    contextLength: session.contextLength,
    answer: session.answer,
    error: session.error,
    steps: store.getSteps(sessionId).map((step) => ({
      iteration: step.iteration,
      type: step.kind,
      response: truncateForDisplay(step.response, displayLimit),
      ...(step.code !== undefined ? { code: truncateForDisplay(step.code, displayLimit) } : {}),
      ...(step.output !== undefined ? { output: truncateForDisplay(step.output, displayLimit) } : {}),
      ...(step.error !== undefined ? { error: step.error } : {}),
      durationMs: step.durationMs,
    })),
    usage: new CostStore(db).getSessionSummary(sessionId),
  };
}

export async function sessionsCommand(options: SessionsOptions): Promise<void> {
  const config = loadCliConfig();
  await withDatabase(config, (db) => {
    printJson(listSessions(db, options));
  });
}

export async function showCommand(sessionId: string): Promise<void> {
  const config = loadCliConfig();
  await withDatabase(config, (db) => {
    const detail = describeSession(db, sessionId, config.displayLimit);
    if (!detail) {
      throw new Error(`No session found with ID: ${sessionId}`);
    }
    printJson(detail);
  });
}
