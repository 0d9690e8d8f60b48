// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Sessions
  `CREATE TABLE IF NOT EXISTS sessions (
    id              TEXT PRIMARY KEY,
    query           TEXT NOT NULL,
    context_type    TEXT NOT NULL CHECK(context_type IN ('string', 'list')),
    context_length  INTEGER NOT NULL DEFAULT 0,
    root_model      TEXT NOT NULL,
    sub_model       TEXT NOT NULL,
    status          TEXT NOT NULL DEFAULT 'running',
    answer          TEXT,
    iterations      INTEGER NOT NULL DEFAULT 0,
    total_cost      REAL NOT NULL DEFAULT 0,
    error           TEXT,
    config_snapshot TEXT NOT NULL,
    usage_summary   TEXT,
    started_at      TEXT NOT NULL,
    updated_at      TEXT NOT NULL,
    completed_at    TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status)',
  'CREATE INDEX IF NOT EXISTS idx_sessions_started ON sessions(started_at DESC)',

  // Trajectory steps
  `CREATE TABLE IF NOT EXISTS session_steps (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id    TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    iteration     INTEGER NOT NULL,
    kind          TEXT NOT NULL CHECK(kind IN ('execution', 'response', 'final')),
    response      TEXT NOT NULL,
    code          TEXT,
    output        TEXT,
    error         TEXT,
    duration_ms   INTEGER NOT NULL DEFAULT 0,
    created_at    TEXT NOT NULL,
    UNIQUE(session_id, iteration)
  )`,
  'CREATE INDEX IF NOT EXISTS idx_steps_session ON session_steps(session_id, iteration)',

  // Cost log
  `CREATE TABLE IF NOT EXISTS cost_log (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id    TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    iteration     INTEGER NOT NULL,
    tier          TEXT NOT NULL CHECK(tier IN ('root', 'sub')),
    depth         INTEGER NOT NULL DEFAULT 0,
    model_id      TEXT NOT NULL,
    input_tokens  INTEGER NOT NULL DEFAULT 0,
    output_tokens INTEGER NOT NULL DEFAULT 0,
    cost_usd      REAL NOT NULL DEFAULT 0,
    latency_ms    INTEGER NOT NULL DEFAULT 0,
    created_at    TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_cost_session ON cost_log(session_id)',
  'CREATE INDEX IF NOT EXISTS idx_cost_model ON cost_log(model_id)',
  'CREATE INDEX IF NOT EXISTS idx_cost_date ON cost_log(created_at)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}
