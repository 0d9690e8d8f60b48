// packages/cli/src/commands/models.ts — rlm models

import { PriceTable } from '@rlm-engine/core';
import type { RlmConfig } from '@rlm-engine/core';
import chalk from 'chalk';

import { loadCliConfig, printJson } from '../utils.js';

export interface ModelsOptions {
  json?: boolean;
}

/** One line per priced model; the configured root and sub models are tagged. */
export function formatPriceTable(config: RlmConfig): string[] {
  const prices = new PriceTable(config.pricing);
  const width = Math.max(...prices.modelIds().map((id) => id.length));

  return prices.list().map((entry) => {
    const tags = [
      entry.modelId === config.rootModel ? 'root' : undefined,
      entry.modelId === config.subModel ? 'sub' : undefined,
    ].filter((t) => t !== undefined);
    const price = `$${entry.inputPer1M} in / $${entry.outputPer1M} out per 1M tokens`;
    const line = `${entry.modelId.padEnd(width)}  ${entry.provider.padEnd(9)}  ${price}`;
    return tags.length > 0 ? chalk.green(`${line}  [${tags.join(', ')}]`) : line;
  });
}

export async function modelsCommand(options: ModelsOptions): Promise<void> {
  const config = loadCliConfig();
  if (options.json) {
    printJson(new PriceTable(config.pricing).list());
    return;
  }
  for (const line of formatPriceTable(config)) console.log(line);
}
