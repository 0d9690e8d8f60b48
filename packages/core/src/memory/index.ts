// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { SessionStore } from './session-store.js';
export { CostStore } from './cost-store.js';
export type { DailyCostRow } from './cost-store.js';
