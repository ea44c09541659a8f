/**
 * Pipeline Type Definitions
 *
 * Contracts between the driver, the stage executors, and the external
 * collaborators (download client, extractors, dictionary, LLM client,
 * packager).
 *
 * @module pipeline/types
 */

import type { AppConfig } from '../config/index.js';
import type { ManifestFile, ModpackInfo } from '../schemas/modpack.js';
import type { LedgerSummary } from '../schemas/state.js';
import type { EntrySet, UnitCategory, UnitKey } from '../schemas/unit.js';
import type { ArtifactStore } from '../storage/artifact-store.js';
import type { PackageKind } from '../storage/paths.js';

// ============================================================================
// Stage Names
// ============================================================================

/**
 * The four stages of the pipeline.
 */
export type StageName = 'download' | 'extract' | 'translate' | 'package';

export const STAGE_NAMES: readonly StageName[] = ['download', 'extract', 'translate', 'package'];

/**
 * Check if a value is a valid stage name.
 */
export function isValidStageName(value: unknown): value is StageName {
  return typeof value === 'string' && (STAGE_NAMES as readonly string[]).includes(value);
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// External Collaborators
// ============================================================================

/**
 * A modpack archive as returned by the download client.
 */
export interface FetchedModpack {
  archive: Buffer;
  info: Omit<ModpackInfo, 'schemaVersion' | 'downloadedAt'>;
}

/**
 * A mod file referenced by a modpack manifest.
 */
export interface FetchedModFile {
  fileName: string;
  data: Buffer;
}

/**
 * Download client. Throws on network or auth failure.
 */
export interface ModpackSource {
  fetch(slug: string, signal?: AbortSignal): Promise<FetchedModpack>;
  fetchModFile(file: ManifestFile, signal?: AbortSignal): Promise<FetchedModFile>;
}

/**
 * Units found by an extractor, keyed by unit name.
 * An empty map means the category has no content in this modpack.
 */
export type ExtractedUnits = Map<string, EntrySet>;

/**
 * Category-specific language file extractor.
 */
export interface Extractor {
  readonly category: UnitCategory;
  extract(instanceDir: string, logger: Logger): Promise<ExtractedUnits>;
}

/**
 * Dictionary lookup: exact lang-key override first, then exact source text.
 * Returns undefined on a miss.
 */
export interface DictionaryLookup {
  lookup(key: string, sourceText: string): string | undefined;
}

/**
 * Options of a single LLM batch request.
 */
export interface TranslateBatchOptions {
  /** Per-request timeout */
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * LLM client. Returns one result per input text, in order; null where the
 * model gave no usable translation for that text.
 * Throws when retries are exhausted or the request times out.
 */
export interface BatchTranslator {
  translateBatch(
    texts: readonly string[],
    options: TranslateBatchOptions
  ): Promise<Array<string | null>>;
}

/**
 * One unit's contribution to a package archive.
 */
export interface PackageUnit {
  unit: Pick<UnitKey, 'category' | 'name'>;
  entries: EntrySet;
}

/**
 * Archive builder. Must be deterministic: equal input, equal bytes.
 */
export interface Packager {
  buildArchive(units: readonly PackageUnit[], kind: PackageKind): Promise<Buffer>;
}

/**
 * All collaborators a pipeline run needs.
 */
export interface Collaborators {
  source: ModpackSource;
  extractors: readonly Extractor[];
  dictionary: DictionaryLookup;
  /** Absent when LLM translation is disabled */
  translator?: BatchTranslator;
  packager: Packager;
}

// ============================================================================
// Stage Context and Run State
// ============================================================================

/**
 * Unit-level lifecycle hooks forwarded from stages to the caller.
 */
export interface UnitEvents {
  onUnitSkip?: (slug: string, unitId: string) => void;
  onUnitComplete?: (slug: string, unitId: string) => void;
  onUnitError?: (slug: string, unitId: string, error: Error) => void;
}

/**
 * Runtime context passed to each stage.
 */
export interface StageContext {
  slug: string;
  config: AppConfig;
  store: ArtifactStore;
  collaborators: Collaborators;
  logger: Logger;
  events: UnitEvents;
  signal?: AbortSignal;
}

/**
 * Mutable per-modpack state the stages read from and write to.
 * Each stage fills its own field; downstream stages read upstream fields.
 */
export interface ModpackRun {
  slug: string;
  /** Set by download */
  modpack?: ModpackInfo;
  /** Set by extract: categories whose artifacts are present after the stage */
  extractedCategories?: UnitCategory[];
  /** Set by translate (resolved units, stable order) */
  units?: UnitKey[];
  /** Set by translate from the saved unit state ledger */
  unitStates?: LedgerSummary;
  /** Set by package */
  packages?: PackageOutcome;
}

/**
 * Archives written by the package stage.
 */
export interface PackageOutcome {
  resourcepack: ArchiveInfo;
  overrides: ArchiveInfo;
}

export interface ArchiveInfo {
  path: string;
  sizeBytes: number;
  /** Number of units that contributed entries */
  unitCount: number;
}

// ============================================================================
// Stage Reports
// ============================================================================

/**
 * A non-fatal failure recorded by a stage.
 */
export interface StageFailure {
  stage: StageName;
  /** Unit id ("mod/create"), category ("ftbquests") or slug */
  target: string;
  /** Error class name (e.g. "TranslationError") */
  kind: string;
  message: string;
}

/**
 * What a stage did for one modpack.
 */
export interface StageReport {
  stage: StageName;
  /** Targets whose work ran */
  executed: string[];
  /** Targets whose artifacts were present and were skipped */
  skipped: string[];
  failures: StageFailure[];
  durationMs: number;
}

/**
 * A pipeline stage executor.
 */
export interface Stage {
  readonly name: StageName;
  execute(context: StageContext, run: ModpackRun): Promise<StageReport>;
}
