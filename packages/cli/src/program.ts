// packages/cli/src/program.ts — rlm command tree

import { AGENT_NAMES, VERSION } from '@rlm-engine/core';
import { Command, Option } from 'commander';

import { costCommand } from './commands/cost.js';
import { modelsCommand } from './commands/models.js';
import { queryCommand } from './commands/query.js';
import { sessionsCommand, showCommand } from './commands/sessions.js';
import { parsePositiveInt, parseRecursionDepth } from './utils.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rlm')
    .description('Answer questions over large contexts with a recursive language model loop')
    .version(VERSION);

  program
    .command('query')
    .description('Run a query over one or more context files')
    .argument('<question>', 'Question to answer')
    .option('--context <files...>', 'Context files; several files become a list context')
    .option('--stdin', 'Read context from stdin')
    .option('--root-model <id>', 'Root model id')
    .option('--sub-model <id>', 'Model used by llm_query')
    .option('--max-iterations <n>', 'Iteration cap', parsePositiveInt)
    .option('--max-depth <n>', 'Recursion limit, 0 or 1 (0 disables llm_query)', parseRecursionDepth)
    .addOption(new Option('--variant <variant>', 'Prompt variant').choices(['gpt', 'qwen']))
    .addOption(new Option('--agent <name>', 'Instruction preset for the root model').choices(AGENT_NAMES))
    .option('--json', 'Print the session payload as JSON')
    .option('--no-save', 'Do not record the session in the project database')
    .option('--verbose', 'Enable debug logging')
    .action(queryCommand);

  program
    .command('sessions')
    .description('List recorded sessions, newest first')
    .addOption(
      new Option('--status <status>', 'Filter by status').choices(['running', 'completed', 'exhausted', 'failed']),
    )
    .option('--limit <n>', 'Max results', parsePositiveInt, 20)
    .action(sessionsCommand);

  program
    .command('show')
    .description('Show a recorded session with its trajectory and usage')
    .argument('<session-id>', 'Session ID')
    .action(showCommand);

  program
    .command('cost')
    .description('Token usage and cost dashboard')
    .addOption(new Option('--scope <scope>', 'Time scope').choices(['session', 'daily', 'all']).default('daily'))
    .option('--days <n>', 'Number of days for daily scope', parsePositiveInt, 30)
    .option('--session <id>', 'Session ID for session scope (default: most recent)')
    .action(costCommand);

  program
    .command('models')
    .description('List priced models')
    .option('--json', 'Print as JSON')
    .action(modelsCommand);

  return program;
}
