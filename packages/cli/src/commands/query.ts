// packages/cli/src/commands/query.ts — rlm query

import {
  CancellationToken,
  Orchestrator,
  agentOverrides,
  createLogger,
  isAgentName,
  openDatabase,
  resolveConfig,
  toSessionPayload,
} from '@rlm-engine/core';
import type { ModelVariant, RlmConfig, RlmConfigOverrides } from '@rlm-engine/core';

import { ProgressRenderer, printSessionSummary } from '../render.js';
import { getDbPath, loadCliConfig, printJson, readContext, readStdin } from '../utils.js';

export interface QueryCommandOptions {
  context?: string[];
  stdin?: boolean;
  rootModel?: string;
  subModel?: string;
  maxIterations?: number;
  maxDepth?: number;
  variant?: ModelVariant;
  /** Instruction preset, e.g. `research`. */
  agent?: string;
  json?: boolean;
  /** `--no-save` turns this off. */
  save: boolean;
  verbose?: boolean;
}

/** Command-line flags as config overrides. Unset flags leave the loaded config alone. */
export function queryOverrides(options: QueryCommandOptions): RlmConfigOverrides {
  return {
    rootModel: options.rootModel,
    subModel: options.subModel,
    maxIterations: options.maxIterations,
    maxRecursionDepth: options.maxDepth,
    modelVariant: options.variant,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

/** Apply the `--agent` preset on top of the loaded config. */
export function applyAgent(config: RlmConfig, agent: string | undefined): RlmConfig {
  if (agent === undefined) return config;
  if (!isAgentName(agent)) {
    throw new Error(`Unknown agent: ${agent}`);
  }
  return resolveConfig(config, agentOverrides(agent, config));
}

export async function queryCommand(question: string, options: QueryCommandOptions): Promise<void> {
  const stdinText = options.stdin ? await readStdin() : undefined;
  const context = readContext(options.context ?? [], stdinText);
  const config = applyAgent(loadCliConfig(queryOverrides(options)), options.agent);

  const token = new CancellationToken();
  const onInterrupt = (): void => token.cancel('Interrupted');
  process.once('SIGINT', onInterrupt);

  const db = options.save ? openDatabase(getDbPath(config)) : undefined;
  const renderer = options.json ? undefined : new ProgressRenderer(config.displayLimit);

  try {
    const orchestrator = new Orchestrator({ config, db, logger: createLogger(config.logLevel) });
    if (renderer) {
      orchestrator.on('event', (event) => renderer.render(event));
    }

    const result = await orchestrator.query(question, context, undefined, { cancellation: token });

    if (options.json) {
      printJson({ session_id: result.sessionId, ...toSessionPayload(result) });
    } else {
      printSessionSummary(result, config.displayLimit);
    }
    // 2 marks a partial answer after the iteration cap
    if (!result.success) process.exitCode = 2;
  } finally {
    renderer?.stop();
    process.off('SIGINT', onInterrupt);
    db?.close();
  }
}
