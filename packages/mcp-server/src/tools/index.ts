// packages/mcp-server/src/tools/index.ts — barrel export

export { handleQuery } from './query.js';
export { handleCost } from './cost.js';
export { classifyError, toolError } from './errors.js';
