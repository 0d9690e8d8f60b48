// packages/core/src/types/config.ts

export type ModelProvider = 'openai' | 'anthropic';

/** Prompt dialect. `qwen` adds the sub-call batching warning. */
export type ModelVariant = 'gpt' | 'qwen';

export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** USD per 1M tokens. */
export interface PriceEntry {
  provider: ModelProvider;
  inputPer1M: number;
  outputPer1M: number;
}

export interface SandboxConfig {
  /** Wall-clock ceiling for one execution. */
  timeoutMs: number;
  memoryLimitMb: number;
}

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  budgetMs: number;
}

export interface ProviderCredentials {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
}

export interface RlmConfig {
  rootModel: string;
  subModel: string;
  maxIterations: number;
  maxOutputTokens: number;
  /** 0 disables llm_query; 1 allows one level below the root. */
  maxRecursionDepth: number;
  modelVariant: ModelVariant;
  /** Preset instructions put ahead of the query as `<instructions>\n\nTask: <query>`. */
  instructions?: string;
  temperature?: number;
  /** Per-call provider timeout in seconds. */
  timeout: number;
  sandbox: SandboxConfig;
  retry: RetrySettings;
  /** Added to or replacing entries of the built-in price table. */
  pricing: Record<string, PriceEntry>;
  provider: ProviderCredentials;
  displayLimit: number;
  logLevel: ConfigLogLevel;
  database: {
    path: string;
  };
}

/** Per-query overrides accepted by `query()` and `Orchestrator#query`. */
export type RlmConfigOverrides = Partial<Omit<RlmConfig, 'sandbox' | 'retry' | 'provider' | 'database'>> & {
  sandbox?: Partial<SandboxConfig>;
  retry?: Partial<RetrySettings>;
  provider?: ProviderCredentials;
  database?: Partial<RlmConfig['database']>;
};
