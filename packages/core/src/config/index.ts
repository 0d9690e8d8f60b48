// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { rlmConfigSchema, validateConfig } from './schema.js';
export type { RlmConfigInput } from './schema.js';
export { loadConfig, resolveConfig, configFromEnv, CONFIG_FILENAME } from './loader.js';
