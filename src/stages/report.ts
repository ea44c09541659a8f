/**
 * Stage report helpers.
 *
 * @module stages/report
 */

import type { PipelineError } from '../pipeline/errors.js';
import type { StageFailure, StageName, StageReport } from '../pipeline/types.js';

/**
 * Mutable report a stage fills while it runs.
 */
export class ReportBuilder {
  private readonly startedAt = Date.now();
  private readonly executed: string[] = [];
  private readonly skipped: string[] = [];
  private readonly failures: StageFailure[] = [];

  constructor(private readonly stage: StageName) {}

  executedTarget(target: string): void {
    this.executed.push(target);
  }

  skippedTarget(target: string): void {
    this.skipped.push(target);
  }

  failed(target: string, error: PipelineError): void {
    this.failures.push(toStageFailure(target, error));
  }

  build(): StageReport {
    return {
      stage: this.stage,
      executed: [...this.executed],
      skipped: [...this.skipped],
      failures: [...this.failures],
      durationMs: Date.now() - this.startedAt,
    };
  }
}

export function toStageFailure(target: string, error: PipelineError): StageFailure {
  return {
    stage: error.stage,
    target,
    kind: error.name,
    message: error.message,
  };
}
