// packages/core/src/models -- Model invocation layer (Vercel AI SDK 5)

export { AiSdkModelClient, createProviderResolver } from './client.js';
export type { ModelClient, ModelResolver, AiSdkModelClientOptions } from './client.js';
export { PriceTable, estimateTokens } from './pricing.js';
