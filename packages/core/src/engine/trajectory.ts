// packages/core/src/engine/trajectory.ts — Ordered step log and cost aggregation for one session

import type { ModelUsageLine, UsageRecord, UsageSummary } from '../types/models.js';
import type { IterationStep } from '../types/session.js';

export type { ModelUsageLine, UsageSummary };

export interface FinishedTrajectory {
  readonly steps: readonly IterationStep[];
  readonly usage: readonly UsageRecord[];
  readonly totalCost: number;
}

export class TrajectoryRecorder {
  private readonly steps: IterationStep[] = [];
  private readonly usage: UsageRecord[] = [];
  private total = 0;
  private finished: FinishedTrajectory | undefined;

  /** Append a step. Iterations must strictly increase. */
  record(step: IterationStep): IterationStep {
    this.assertOpen();
    const last = this.steps.at(-1);
    if (last && step.iteration <= last.iteration) {
      throw new Error(`Step for iteration ${step.iteration} recorded after iteration ${last.iteration}`);
    }
    const frozen = Object.freeze({ ...step });
    this.steps.push(frozen);
    return frozen;
  }

  /** Add one client call to the running total. Returns the new total. */
  recordUsage(record: UsageRecord): number {
    this.assertOpen();
    if (!(record.costUsd >= 0)) {
      throw new Error(`Usage record for ${record.modelId} has invalid cost ${record.costUsd}`);
    }
    this.usage.push(Object.freeze({ ...record }));
    this.total += record.costUsd;
    return this.total;
  }

  get totalCost(): number {
    return this.total;
  }

  get stepCount(): number {
    return this.steps.length;
  }

  get isFinished(): boolean {
    return this.finished !== undefined;
  }

  /** Freeze the log. Idempotent; recording afterwards throws. */
  finish(): FinishedTrajectory {
    this.finished ??= Object.freeze({
      steps: Object.freeze([...this.steps]),
      usage: Object.freeze([...this.usage]),
      totalCost: this.total,
    });
    return this.finished;
  }

  /** Usage so far, grouped by model. Also valid after `finish()`. */
  summary(): UsageSummary {
    return summarizeUsage(this.usage);
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Trajectory is finished; no further records are accepted');
    }
  }
}

/** Per-model usage lines, sorted by cost descending. */
export function summarizeUsage(records: readonly UsageRecord[]): UsageSummary {
  const byModel = new Map<string, ModelUsageLine>();
  for (const r of records) {
    const line = byModel.get(r.modelId) ?? {
      modelId: r.modelId,
      calls: 0,
      promptTokens: 0,
      completionTokens: 0,
      costUsd: 0,
    };
    line.calls += 1;
    line.promptTokens += r.promptTokens;
    line.completionTokens += r.completionTokens;
    line.costUsd += r.costUsd;
    byModel.set(r.modelId, line);
  }
  const models = [...byModel.values()].sort((a, b) => b.costUsd - a.costUsd);
  return {
    models,
    calls: records.length,
    promptTokens: models.reduce((n, m) => n + m.promptTokens, 0),
    completionTokens: models.reduce((n, m) => n + m.completionTokens, 0),
    totalCost: models.reduce((n, m) => n + m.costUsd, 0),
  };
}
