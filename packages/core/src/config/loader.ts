// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { RlmConfig, RlmConfigOverrides } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.rlm.yml';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. Undefined source values are skipped.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Map recognised environment variables onto config keys.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const layer: PlainObject = {};
  if (env.RLM_ROOT_MODEL) layer.rootModel = env.RLM_ROOT_MODEL;
  if (env.RLM_SUB_MODEL) layer.subModel = env.RLM_SUB_MODEL;

  const provider: PlainObject = {};
  if (env.OPENAI_API_KEY) provider.openaiApiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL) provider.openaiBaseUrl = env.OPENAI_BASE_URL;
  if (env.ANTHROPIC_API_KEY) provider.anthropicApiKey = env.ANTHROPIC_API_KEY;
  if (Object.keys(provider).length > 0) layer.provider = provider;

  return layer;
}

/**
 * Load config with precedence: overrides > environment > .rlm.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .rlm.yml from projectDir on top
 * 3. Merge environment variables on top
 * 4. Merge programmatic overrides on top
 * 5. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: RlmConfigOverrides;
  env?: NodeJS.ProcessEnv;
  skipFile?: boolean;
}): RlmConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = structuredClone({ ...DEFAULT_CONFIG });

  // Layer 2: Project file (.rlm.yml)
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (fileConfig !== null && fileConfig !== undefined) {
      if (!isPlainObject(fileConfig)) {
        throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
      }
      merged = deepMerge(merged, fileConfig);
    }
  }

  // Layer 3: Environment
  merged = deepMerge(merged, configFromEnv(options?.env ?? process.env));

  // Layer 4: Programmatic overrides
  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged);
}

/**
 * Apply per-query overrides to an already resolved config and re-validate.
 */
export function resolveConfig(base: RlmConfig, overrides?: RlmConfigOverrides): RlmConfig {
  if (!overrides) return base;
  return validateConfig(deepMerge({ ...base }, { ...overrides }));
}

export { deepMerge };
