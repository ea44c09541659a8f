/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the work tree. Every function takes
 * the root directory explicitly; nothing here reads the environment.
 *
 * Directory Structure:
 * ```
 * <root>/
 * ├── work/
 * │   ├── dict-mini.json                      # Cached dictionary download
 * │   └── <slug>/
 * │       ├── download/
 * │       │   ├── modpack.zip                 # Raw CurseForge archive
 * │       │   └── modpack.json                # ModpackInfo
 * │       ├── instance/                       # Installed modpack tree
 * │       ├── extracted/
 * │       │   ├── mods/<mod>/entries.json
 * │       │   ├── kubejs/entries.json
 * │       │   └── ftbquests/entries.json
 * │       ├── translated/
 * │       │   ├── mods/<mod>/{entries.json, unit.json}
 * │       │   ├── kubejs/{entries.json, unit.json}
 * │       │   └── ftbquests/{entries.json, unit.json}
 * │       └── state.json                      # Unit state ledger
 * └── output/
 *     └── <slug>/
 *         ├── <slug>-localization-resourcepack.zip
 *         ├── <slug>-localization-overrides.zip
 *         └── version.json
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import type { UnitCategory } from '../schemas/unit.js';

/**
 * Directory name of each category under extracted/ and translated/.
 */
export const CATEGORY_DIRS: Record<UnitCategory, string> = {
  mod: 'mods',
  kubejs: 'kubejs',
  ftbquests: 'ftbquests',
};

/** File holding a unit's entry set */
export const ENTRIES_FILE = 'entries.json';

/** File holding a translated unit's record */
export const UNIT_RECORD_FILE = 'unit.json';

/** File holding the source entries a translation was made from */
export const SOURCE_FILE = 'source.json';

/** File listing the mod units a category was extracted with */
export const UNIT_INDEX_FILE = 'units.json';

/**
 * Artifact stages that own a directory under work/<slug>/.
 */
export type ArtifactStage = 'extracted' | 'translated';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'slug', 'unit name')
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the work root shared by all modpacks.
 *
 * @param root - Project root directory
 * @returns Absolute path to `<root>/work`
 */
export function getWorkRoot(root: string): string {
  return path.resolve(root, 'work');
}

/**
 * Gets the work directory of a modpack.
 *
 * @param root - Project root directory
 * @param slug - Modpack slug
 * @returns Absolute path to `<root>/work/<slug>`
 * @example
 * ```typescript
 * getWorkDir('/data', 'all-the-mods-10'); // '/data/work/all-the-mods-10'
 * ```
 */
export function getWorkDir(root: string, slug: string): string {
  validateIdSecurity(slug, 'slug');
  return path.join(getWorkRoot(root), slug);
}

/**
 * Gets the download directory of a modpack (raw archive + metadata).
 */
export function getDownloadDir(root: string, slug: string): string {
  return path.join(getWorkDir(root, slug), 'download');
}

export function getArchivePath(root: string, slug: string): string {
  return path.join(getDownloadDir(root, slug), 'modpack.zip');
}

export function getModpackInfoPath(root: string, slug: string): string {
  return path.join(getDownloadDir(root, slug), 'modpack.json');
}

/**
 * Gets the installed modpack tree the extractors read from.
 */
export function getInstanceDir(root: string, slug: string): string {
  return path.join(getWorkDir(root, slug), 'instance');
}

/**
 * Gets the directory of one artifact stage (extracted/ or translated/).
 */
export function getStageDir(root: string, slug: string, stage: ArtifactStage): string {
  return path.join(getWorkDir(root, slug), stage);
}

/**
 * Gets the directory of one category within an artifact stage.
 *
 * @example
 * ```typescript
 * getCategoryDir('/data', 'pack-a', 'extracted', 'mod');
 * // '/data/work/pack-a/extracted/mods'
 * ```
 */
export function getCategoryDir(
  root: string,
  slug: string,
  stage: ArtifactStage,
  category: UnitCategory
): string {
  return path.join(getStageDir(root, slug, stage), CATEGORY_DIRS[category]);
}

/**
 * Gets the leaf directory of a unit. Its presence is the unit's cache record.
 *
 * Mod units get one directory per mod under mods/; the singleton categories
 * use the category directory itself.
 *
 * @example
 * ```typescript
 * getUnitDir('/data', 'pack-a', 'translated', { category: 'mod', name: 'create' });
 * // '/data/work/pack-a/translated/mods/create'
 * getUnitDir('/data', 'pack-a', 'translated', { category: 'kubejs', name: 'kubejs' });
 * // '/data/work/pack-a/translated/kubejs'
 * ```
 */
export function getUnitDir(
  root: string,
  slug: string,
  stage: ArtifactStage,
  unit: { category: UnitCategory; name: string }
): string {
  const categoryDir = getCategoryDir(root, slug, stage, unit.category);
  if (unit.category !== 'mod') {
    return categoryDir;
  }
  validateIdSecurity(unit.name, 'unit name');
  return path.join(categoryDir, unit.name);
}

/**
 * Gets the unit state ledger of a modpack.
 */
export function getStateFilePath(root: string, slug: string): string {
  return path.join(getWorkDir(root, slug), 'state.json');
}

/**
 * Gets the cached dictionary download.
 */
export function getDictionaryCachePath(root: string): string {
  return path.join(getWorkRoot(root), 'dict-mini.json');
}

// ============================================
// Output Paths
// ============================================

/**
 * Gets the output directory of a modpack.
 */
export function getOutputDir(root: string, slug: string): string {
  validateIdSecurity(slug, 'slug');
  return path.resolve(root, 'output', slug);
}

/**
 * Archive kinds produced by the Package stage.
 */
export type PackageKind = 'resourcepack' | 'overrides';

/**
 * Gets the path of a package archive.
 *
 * @example
 * ```typescript
 * getPackagePath('/data', 'pack-a', 'overrides');
 * // '/data/output/pack-a/pack-a-localization-overrides.zip'
 * ```
 */
export function getPackagePath(root: string, slug: string, kind: PackageKind): string {
  return path.join(getOutputDir(root, slug), `${slug}-localization-${kind}.zip`);
}

/**
 * Gets the version record written after packaging.
 */
export function getVersionFilePath(root: string, slug: string): string {
  return path.join(getOutputDir(root, slug), 'version.json');
}
