// packages/core/src/engine/query.ts — One-shot entry point

import { loadConfig } from '../config/loader.js';
import type { RlmConfigOverrides } from '../types/config.js';
import type { ContextInput, SessionResult } from '../types/session.js';
import { Orchestrator } from './orchestrator.js';

/**
 * Answer `query` over `context` with a fresh orchestrator. Configuration is
 * layered from defaults, `.rlm.yml` in the working directory, the environment
 * and finally `config`.
 *
 * @example
 * const result = await query('Which city is mentioned most often?', documents, { maxIterations: 10 });
 */
export async function query(
  query: string,
  context: ContextInput,
  config?: RlmConfigOverrides,
): Promise<SessionResult> {
  const orchestrator = new Orchestrator({ config: loadConfig({ overrides: config }) });
  return orchestrator.query(query, context);
}
