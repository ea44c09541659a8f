/**
 * Pipeline Infrastructure
 *
 * Stage graph, driver, error taxonomy and the contracts between stages
 * and their collaborators.
 *
 * @module pipeline
 */

export {
  type StageName,
  STAGE_NAMES,
  isValidStageName,
  type Logger,
  silentLogger,
  type FetchedModpack,
  type FetchedModFile,
  type ModpackSource,
  type ExtractedUnits,
  type Extractor,
  type DictionaryLookup,
  type TranslateBatchOptions,
  type BatchTranslator,
  type PackageUnit,
  type Packager,
  type Collaborators,
  type UnitEvents,
  type StageContext,
  type ModpackRun,
  type PackageOutcome,
  type ArchiveInfo,
  type StageFailure,
  type StageReport,
  type Stage,
} from './types.js';

export {
  STAGE_GRAPH,
  EXECUTION_ORDER,
  topologicalOrder,
  getUpstreamStages,
} from './dependencies.js';

export {
  PipelineError,
  DownloadError,
  ExtractionError,
  TranslationError,
  PackageError,
  errorMessage,
} from './errors.js';

export { ConcurrencyLimiter, mapSettled } from './concurrency.js';
export { UnitResolver } from './resolver.js';

export {
  PipelineExecutor,
  type PipelineExecutorOptions,
  type ExecutorCallbacks,
  type ModpackResult,
  type RunResult,
  type PipelineTiming,
} from './executor.js';
