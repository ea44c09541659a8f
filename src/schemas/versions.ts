/**
 * Schema Version Registry
 *
 * Every persisted record carries a schemaVersion field. Each record type is
 * versioned independently with a plain integer.
 */

/**
 * Current schema versions for all persisted record types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Translated unit record (unit.json) */
  unitRecord: 1,
  /** Per-modpack unit state ledger (state.json) */
  unitState: 1,
  /** Downloaded modpack metadata (modpack.json / version.json) */
  modpackInfo: 1,
  /** Application configuration file */
  appConfig: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;
