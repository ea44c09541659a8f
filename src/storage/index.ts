/**
 * Storage Layer
 *
 * File-based persistence for the work tree: downloaded modpacks, extracted
 * and translated units, and the unit state ledger.
 * All write operations use the atomic temp + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  CATEGORY_DIRS,
  ENTRIES_FILE,
  UNIT_RECORD_FILE,
  validateIdSecurity,
  getWorkRoot,
  getWorkDir,
  getDownloadDir,
  getArchivePath,
  getModpackInfoPath,
  getInstanceDir,
  getStageDir,
  getCategoryDir,
  getUnitDir,
  getStateFilePath,
  getDictionaryCachePath,
  getOutputDir,
  getPackagePath,
  getVersionFilePath,
  type ArtifactStage,
  type PackageKind,
} from './paths.js';

// Atomic operations
export {
  atomicWriteFile,
  atomicWriteJson,
  publishDirectory,
  readJson,
  serializeJson,
  stripBom,
  fileExists,
  directoryExists,
} from './atomic.js';

// Artifact store
export {
  ArtifactStore,
  hashEntrySet,
  type UnitRef,
  type DownloadArtifact,
  type StoredTranslation,
} from './artifact-store.js';

// Unit state ledger
export { loadLedger, saveLedger, applyStatuses, listFailedUnits, summarizeLedger } from './state.js';
