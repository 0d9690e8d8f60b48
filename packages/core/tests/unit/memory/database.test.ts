import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getSchemaVersion, openDatabase, runMigrations } from '../../../src/memory/database.js';

let db: Database.Database;

beforeEach(() => {
  db = openDatabase(':memory:');
});

afterEach(() => {
  db.close();
});

describe('openDatabase', () => {
  it('creates all tables', () => {
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((r) => r.name);
    expect(tables).toEqual(expect.arrayContaining(['cost_log', 'schema_meta', 'session_steps', 'sessions']));
  });

  it('records the schema version', () => {
    expect(getSchemaVersion(db)).toBe('1');
  });

  it('enables foreign keys', () => {
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('migrations are idempotent', () => {
    expect(() => runMigrations(db)).not.toThrow();
    expect(getSchemaVersion(db)).toBe('1');
  });
});
