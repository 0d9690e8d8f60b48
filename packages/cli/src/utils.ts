// packages/cli/src/utils.ts

import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { loadConfig, openDatabase } from '@rlm-engine/core';
import type { ContextInput, RlmConfig, RlmConfigOverrides } from '@rlm-engine/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

export type Db = ReturnType<typeof openDatabase>;

/** Absolute database path for `config`, creating its directory. */
export function getDbPath(config: RlmConfig, projectDir = process.cwd()): string {
  const dbPath = resolve(projectDir, config.database.path);
  mkdirSync(dirname(dbPath), { recursive: true });
  return dbPath;
}

export function loadCliConfig(overrides?: RlmConfigOverrides): RlmConfig {
  return loadConfig({ projectDir: process.cwd(), overrides });
}

/**
 * Run `fn` with the project database; the connection is closed on every path.
 */
export async function withDatabase<T>(
  config: RlmConfig,
  fn: (db: Db) => Promise<T> | T,
): Promise<T> {
  const db = openDatabase(getDbPath(config));
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

export function parseRecursionDepth(value: string): number {
  if (value !== '0' && value !== '1') throw new InvalidArgumentError('Must be 0 or 1');
  return Number(value);
}

/**
 * Assemble the session context: one source stays a string, several become a
 * list in the order given (files first, then stdin).
 */
export function readContext(files: string[], stdinText?: string): ContextInput {
  const chunks = files.map((file) => readFileSync(file, 'utf-8'));
  if (stdinText !== undefined) chunks.push(stdinText);

  const [only, ...rest] = chunks;
  if (only === undefined) {
    throw new Error('No context given: pass --context <files...> or --stdin');
  }
  return rest.length === 0 ? only : chunks;
}

export async function readStdin(): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of process.stdin) {
    parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(parts).toString('utf-8');
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function reportError(error: unknown): void {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
}
