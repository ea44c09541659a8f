/**
 * Pipeline Executor
 *
 * Drives the stage graph for each configured modpack. Stages run in the
 * graph's topological order; a fatal failure halts the failing stage's
 * downstream stages for that modpack only. Modpacks run on a bounded pool
 * and never affect one another.
 *
 * @module pipeline/executor
 */

import type { AppConfig } from '../config/index.js';
import type { LedgerSummary } from '../schemas/state.js';
import type { ArtifactStore } from '../storage/artifact-store.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { EXECUTION_ORDER, getUpstreamStages } from './dependencies.js';
import { PipelineError, errorMessage } from './errors.js';
import {
  STAGE_NAMES,
  silentLogger,
  type Collaborators,
  type Logger,
  type ModpackRun,
  type PackageOutcome,
  type Stage,
  type StageContext,
  type StageFailure,
  type StageName,
  type StageReport,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing information for pipeline execution
 */
export interface PipelineTiming {
  /** ISO8601 timestamp when execution started */
  startedAt: string;
  /** ISO8601 timestamp when execution completed */
  completedAt: string;
  durationMs: number;
}

/**
 * Outcome of one modpack.
 */
export interface ModpackResult {
  slug: string;
  /**
   * True when Download, Extract and Package all succeeded and Package ran.
   * Unit-level translation failures do not clear it.
   */
  success: boolean;
  /** Reports of the stages that ran, in execution order */
  stages: StageReport[];
  /** Stages not run because an upstream stage failed */
  stagesBlocked: StageName[];
  /** Every failure, fatal or not */
  failures: StageFailure[];
  /** The failure that halted the modpack, if any */
  fatal?: StageFailure;
  /** Number of resolved units */
  unitCount: number;
  /** Unit states as recorded in the ledger after Translate */
  unitStates?: LedgerSummary;
  packages?: PackageOutcome;
  timing: PipelineTiming & { perStage: Partial<Record<StageName, number>> };
}

/**
 * Outcome of a whole invocation.
 */
export interface RunResult {
  /** True when every modpack succeeded */
  success: boolean;
  modpacks: ModpackResult[];
  timing: PipelineTiming;
}

/**
 * Callback for pipeline lifecycle events
 */
export interface ExecutorCallbacks {
  onModpackStart?: (slug: string) => void;
  onModpackComplete?: (result: ModpackResult) => void;
  /** Called when a stage starts */
  onStageStart?: (slug: string, stage: StageName) => void;
  /** Called when a stage completes (possibly with non-fatal failures) */
  onStageComplete?: (slug: string, report: StageReport) => void;
  /** Called when a stage fails fatally */
  onStageError?: (slug: string, stage: StageName, error: PipelineError) => void;
  /** Called when a stage is blocked by a failed upstream stage */
  onStageSkip?: (slug: string, stage: StageName, blockedBy: StageName) => void;
  onUnitSkip?: (slug: string, unitId: string) => void;
  onUnitComplete?: (slug: string, unitId: string) => void;
  onUnitError?: (slug: string, unitId: string, error: Error) => void;
}

export interface PipelineExecutorOptions {
  config: AppConfig;
  store: ArtifactStore;
  collaborators: Collaborators;
  logger?: Logger;
}

/** Stages whose failure makes a modpack unsuccessful */
const MODPACK_FAILING_STAGES: ReadonlySet<StageName> = new Set(['download', 'extract', 'package']);

// ============================================================================
// Pipeline Executor Class
// ============================================================================

/**
 * Pipeline executor that manages stage execution.
 *
 * @example
 * ```typescript
 * const executor = new PipelineExecutor({ config, store, collaborators, logger });
 * executor.registerStages(DEFAULT_STAGES);
 * const result = await executor.execute();
 * process.exitCode = result.success ? 0 : 1;
 * ```
 */
export class PipelineExecutor {
  private stages: Map<StageName, Stage> = new Map();
  private callbacks: ExecutorCallbacks = {};
  private readonly logger: Logger;

  constructor(private readonly options: PipelineExecutorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  // ==========================================================================
  // Stage Registration
  // ==========================================================================

  /**
   * Register a stage with the executor.
   *
   * @throws Error if a stage with that name is already registered
   */
  registerStage(stage: Stage): void {
    if (this.stages.has(stage.name)) {
      throw new Error(`Stage ${stage.name} is already registered`);
    }
    this.stages.set(stage.name, stage);
  }

  registerStages(stages: readonly Stage[]): void {
    for (const stage of stages) {
      this.registerStage(stage);
    }
  }

  getMissingStages(): StageName[] {
    return STAGE_NAMES.filter((name) => !this.stages.has(name));
  }

  /**
   * Set event callbacks for stage lifecycle.
   */
  setCallbacks(callbacks: ExecutorCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Execution order derived from the stage graph.
   */
  getExecutionOrder(): StageName[] {
    return [...EXECUTION_ORDER];
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run every configured modpack (or the given slugs) on a pool of
   * `concurrency.modpacks` workers. Results keep the slug order.
   *
   * @throws Error if a stage is not registered
   */
  async execute(slugs: readonly string[] = this.options.config.slugs, signal?: AbortSignal): Promise<RunResult> {
    this.assertComplete();
    const startedAt = new Date();
    const limiter = new ConcurrencyLimiter(this.options.config.concurrency.modpacks);

    const settled = await Promise.allSettled(
      slugs.map((slug) => limiter.run(() => this.executeModpack(slug, signal)))
    );

    const modpacks = settled.map((result, index): ModpackResult => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      // executeModpack converts stage errors; anything reaching here is a driver bug
      const slug = slugs[index];
      const failure: StageFailure = {
        stage: 'download',
        target: slug,
        kind: 'Error',
        message: errorMessage(result.reason),
      };
      this.logger.error(`[${slug}] Unexpected failure: ${failure.message}`);
      return emptyResult(slug, failure);
    });

    const completedAt = new Date();
    return {
      success: modpacks.every((modpack) => modpack.success),
      modpacks,
      timing: {
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
      },
    };
  }

  /**
   * Run the stage graph for one modpack.
   *
   * @throws Error if a stage is not registered
   */
  async executeModpack(slug: string, signal?: AbortSignal): Promise<ModpackResult> {
    this.assertComplete();
    const startedAt = new Date();
    this.callbacks.onModpackStart?.(slug);

    const context: StageContext = {
      slug,
      config: this.options.config,
      store: this.options.store,
      collaborators: this.options.collaborators,
      logger: this.logger,
      events: {
        onUnitSkip: this.callbacks.onUnitSkip,
        onUnitComplete: this.callbacks.onUnitComplete,
        onUnitError: this.callbacks.onUnitError,
      },
      signal,
    };
    const run: ModpackRun = { slug };

    const reports: StageReport[] = [];
    const failures: StageFailure[] = [];
    const blocked: StageName[] = [];
    const halted = new Set<StageName>();
    const perStage: Partial<Record<StageName, number>> = {};
    let fatal: StageFailure | undefined;

    for (const name of EXECUTION_ORDER) {
      const stage = this.getStage(name);

      const blockedBy = getUpstreamStages(name).find((upstream) => halted.has(upstream));
      if (blockedBy !== undefined) {
        halted.add(name);
        blocked.push(name);
        this.callbacks.onStageSkip?.(slug, name, blockedBy);
        continue;
      }

      const stageStart = Date.now();
      this.callbacks.onStageStart?.(slug, name);

      try {
        const report = await stage.execute(context, run);
        reports.push(report);
        failures.push(...report.failures);
        this.callbacks.onStageComplete?.(slug, report);
      } catch (error) {
        const pipelineError =
          error instanceof PipelineError
            ? error
            : new PipelineError(errorMessage(error), name, slug, { cause: error });

        const failure: StageFailure = {
          stage: name,
          target: slug,
          kind: pipelineError.name,
          message: pipelineError.message,
        };
        failures.push(failure);
        this.callbacks.onStageError?.(slug, name, pipelineError);
        this.logger.error(`[${slug}] ${pipelineError.message}`);

        if (pipelineError.isFatal) {
          fatal = failure;
          halted.add(name);
        }
      }

      perStage[name] = Date.now() - stageStart;
    }

    const completedAt = new Date();
    const result: ModpackResult = {
      slug,
      success:
        !blocked.includes('package') &&
        !failures.some((failure) => MODPACK_FAILING_STAGES.has(failure.stage)),
      stages: reports,
      stagesBlocked: blocked,
      failures,
      fatal,
      unitCount: run.units?.length ?? 0,
      unitStates: run.unitStates,
      packages: run.packages,
      timing: {
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
        perStage,
      },
    };

    this.callbacks.onModpackComplete?.(result);
    return result;
  }

  private getStage(name: StageName): Stage {
    const stage = this.stages.get(name);
    if (!stage) {
      throw new Error(`Stage ${name} not registered. Call registerStage() first.`);
    }
    return stage;
  }

  private assertComplete(): void {
    const missing = this.getMissingStages();
    if (missing.length > 0) {
      throw new Error(`Stages not registered: ${missing.join(', ')}`);
    }
  }
}

function emptyResult(slug: string, failure: StageFailure): ModpackResult {
  const now = new Date().toISOString();
  return {
    slug,
    success: false,
    stages: [],
    stagesBlocked: [],
    failures: [failure],
    fatal: failure,
    unitCount: 0,
    timing: { startedAt: now, completedAt: now, durationMs: 0, perStage: {} },
  };
}
