/**
 * Schema exports
 *
 * @module schemas
 */

export { SCHEMA_VERSIONS, type SchemaType } from './versions.js';
export { ISO8601TimestampSchema, SlugSchema, Sha256Schema } from './common.js';
export {
  UNIT_CATEGORIES,
  SINGLETON_UNIT_NAMES,
  UnitCategorySchema,
  UnitKeySchema,
  EntrySetSchema,
  TranslationSourceSchema,
  UnitRecordSchema,
  singletonUnit,
  formatUnitId,
  parseUnitId,
  compareUnits,
  type UnitCategory,
  type UnitKey,
  type EntrySet,
  type TranslationSource,
  type TranslatedEntrySet,
  type UnitRecord,
} from './unit.js';
export {
  UnitStatusSchema,
  UnitStateLedgerSchema,
  createEmptyLedger,
  type UnitStatus,
  type UnitStateLedger,
  type LedgerSummary,
} from './state.js';
export {
  ModpackInfoSchema,
  ManifestFileSchema,
  CurseForgeManifestSchema,
  type ModpackInfo,
  type ManifestFile,
  type CurseForgeManifest,
} from './modpack.js';
export {
  DEFAULT_DICTIONARY_URL,
  LlmSettingsSchema,
  AppConfigFileSchema,
  type LlmSettings,
  type AppConfigFile,
} from './app-config.js';
