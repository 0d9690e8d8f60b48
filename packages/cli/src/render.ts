// packages/cli/src/render.ts — Terminal rendering for engine events

import { truncateForDisplay } from '@rlm-engine/core';
import type { EngineEvent, SessionResult } from '@rlm-engine/core';
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

function indent(text: string, prefix = '    '): string {
  return text
    .split('\n')
    .map((line) => prefix + line)
    .join('\n');
}

/**
 * Lines to print for one event. Long model text, code and output are cut to
 * `displayLimit` characters.
 */
export function formatEvent(event: EngineEvent, displayLimit: number): string[] {
  switch (event.type) {
    case 'session.started':
      return [
        chalk.gray(`━━━ Session ${event.sessionId} ━━━`),
        chalk.gray(`Query:  ${event.query}`),
        chalk.gray(`Models: root=${event.rootModel} sub=${event.subModel}, up to ${event.maxIterations} iterations`),
      ];

    case 'iteration.started':
      return [chalk.blue(`\n▶ Iteration ${event.iteration}/${event.maxIterations}`)];

    case 'model.response':
      return [
        chalk.gray(`  ${event.model} replied in ${(event.durationMs / 1000).toFixed(1)}s`),
        indent(truncateForDisplay(event.text, displayLimit)),
      ];

    case 'code.executed': {
      const lines = [
        chalk.yellow(`  ▸ executed (${event.durationMs}ms)`),
        chalk.gray(indent(truncateForDisplay(event.code, displayLimit))),
      ];
      if (event.output.length > 0) {
        lines.push(chalk.green(indent(truncateForDisplay(event.output.replace(/\n$/, ''), displayLimit))));
      }
      if (event.error) {
        lines.push(chalk.red(indent(truncateForDisplay(event.error, displayLimit))));
      }
      return lines;
    }

    case 'cost.update':
      return [
        chalk.cyan(
          `  $${event.costUsd.toFixed(4)} ${event.tier} ${event.model} (cumulative: $${event.cumulativeSessionCost.toFixed(4)})`,
        ),
      ];

    case 'session.completed':
      return [chalk.green(`\n━━━ Completed in ${event.iterations} iteration(s) ━━━`)];

    case 'session.exhausted':
      return [chalk.yellow(`\n━━━ Iteration limit reached after ${event.iterations} iteration(s) ━━━`)];

    case 'session.failed':
      return [chalk.red('\n━━━ Session Failed ━━━'), chalk.red(`  Error: ${event.error}`)];
  }
}

/**
 * Prints events as they arrive, with a spinner while the root model is working.
 * The spinner writes to stderr so piped stdout stays clean.
 */
export class ProgressRenderer {
  private spinner: Ora | null = null;

  constructor(private readonly displayLimit: number) {}

  render(event: EngineEvent): void {
    this.stopSpinner();
    for (const line of formatEvent(event, this.displayLimit)) console.log(line);
    if (event.type === 'iteration.started') {
      this.spinner = ora({ text: chalk.gray('waiting for the root model...'), stream: process.stderr }).start();
    }
  }

  stop(): void {
    this.stopSpinner();
  }

  private stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

/**
 * Final answer plus a per-model cost table.
 */
export function formatSessionSummary(result: SessionResult, displayLimit: number): string[] {
  const usage = result.usageSummary;
  const status =
    result.status === 'completed' ? chalk.green('completed') : chalk.yellow(`${result.status} (partial answer)`);

  const lines = [
    chalk.bold('\nAnswer'),
    truncateForDisplay(result.answer.length > 0 ? result.answer : '(none)', displayLimit),
    chalk.bold('\nSession Summary'),
    chalk.gray('-'.repeat(40)),
    `  Session:    ${chalk.white(result.sessionId)}`,
    `  Status:     ${status}`,
    `  Iterations: ${chalk.cyan(String(result.iterations))}`,
    `  Calls:      ${chalk.cyan(String(usage.calls))}`,
    `  Tokens:     ${chalk.cyan(`${usage.promptTokens.toLocaleString()} in / ${usage.completionTokens.toLocaleString()} out`)}`,
    `  Cost:       ${chalk.cyan(`$${result.totalCost.toFixed(4)}`)}`,
  ];
  for (const model of usage.models) {
    lines.push(chalk.gray(`    ${model.modelId}: ${model.calls} call(s), $${model.costUsd.toFixed(4)}`));
  }
  lines.push(chalk.gray('-'.repeat(40)));
  return lines;
}

export function printSessionSummary(result: SessionResult, displayLimit: number): void {
  for (const line of formatSessionSummary(result, displayLimit)) console.log(line);
}
