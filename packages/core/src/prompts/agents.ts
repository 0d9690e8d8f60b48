// packages/core/src/prompts/agents.ts — Instruction presets for common kinds of task

import type { RlmConfig, RlmConfigOverrides } from '../types/config.js';

export type AgentName = 'research';

export interface AgentPreset {
  readonly name: AgentName;
  /** Prefixed to every query run under the preset. */
  readonly instructions: string;
  /** Iteration cap floor; a higher configured cap is kept. */
  readonly minIterations: number;
}

export const AGENT_PRESETS: Readonly<Record<AgentName, AgentPreset>> = Object.freeze({
  research: {
    name: 'research',
    instructions:
      'You are an expert research assistant. Give comprehensive, accurate answers grounded in the provided ' +
      'context and cite the passages you rely on. Look for nuances and contradictory evidence, and synthesize ' +
      'multiple viewpoints when the context offers them.',
    minIterations: 20,
  },
});

export const AGENT_NAMES = Object.keys(AGENT_PRESETS);

export function isAgentName(name: string): name is AgentName {
  return Object.hasOwn(AGENT_PRESETS, name);
}

/** Overrides that run a query under `name` on top of `config`. */
export function agentOverrides(name: AgentName, config: RlmConfig): RlmConfigOverrides {
  const preset = AGENT_PRESETS[name];
  return {
    instructions: preset.instructions,
    maxIterations: Math.max(config.maxIterations, preset.minIterations),
  };
}

/** The query as the root model sees it. */
export function withInstructions(query: string, instructions?: string): string {
  return instructions ? `${instructions}\n\nTask: ${query}` : query;
}
