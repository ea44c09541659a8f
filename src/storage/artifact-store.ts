/**
 * Artifact Store
 *
 * Maps (modpack, stage, unit) to presence or absence on disk. The presence of
 * a unit's leaf directory is the cache record: nothing else is consulted to
 * decide whether work is skipped. Every write publishes a complete directory
 * (or file) in a single rename, so a concurrent `exists` never observes a
 * partially written unit.
 *
 * Entries are never expired or evicted. Deleting a leaf directory is the
 * supported way to force recomputation of that unit.
 *
 * @module storage/artifact-store
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import {
  EntrySetSchema,
  UnitRecordSchema,
  type EntrySet,
  type UnitCategory,
  type UnitKey,
  type UnitRecord,
} from '../schemas/unit.js';
import { ModpackInfoSchema, type ModpackInfo } from '../schemas/modpack.js';
import {
  atomicWriteFile,
  directoryExists,
  fileExists,
  publishDirectory,
  readJson,
  serializeJson,
} from './atomic.js';
import {
  ENTRIES_FILE,
  SOURCE_FILE,
  UNIT_INDEX_FILE,
  UNIT_RECORD_FILE,
  getArchivePath,
  getCategoryDir,
  getInstanceDir,
  getModpackInfoPath,
  getUnitDir,
  validateIdSecurity,
  type ArtifactStage,
} from './paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Unit address within a modpack (the slug is passed separately).
 */
export type UnitRef = Pick<UnitKey, 'category' | 'name'>;

/**
 * Downloaded modpack as handed to the store.
 */
export interface DownloadArtifact {
  /** Raw archive bytes */
  archive: Buffer;
  /** Metadata describing the archive */
  info: ModpackInfo;
}

/**
 * Content of a translated unit directory.
 */
export interface StoredTranslation {
  entries: EntrySet;
  record: UnitRecord;
  /** Extracted entries the translation was made from */
  source?: EntrySet;
}

const UnitIndexSchema = z.array(z.string());

// ============================================================================
// Hashing
// ============================================================================

/**
 * SHA-256 of an entry set in its on-disk serialization.
 * Key order is significant.
 *
 * @param entries - Entry set to hash
 * @returns 64-character lowercase hex digest
 */
export function hashEntrySet(entries: EntrySet): string {
  return crypto.createHash('sha256').update(serializeJson(entries)).digest('hex');
}

// ============================================================================
// Artifact Store
// ============================================================================

/**
 * File-system artifact store rooted at a project directory.
 *
 * @example
 * ```typescript
 * const store = new ArtifactStore('/data');
 * if (!(await store.exists('pack-a', 'translated', { category: 'mod', name: 'create' }))) {
 *   // translate and write
 * }
 * ```
 */
export class ArtifactStore {
  constructor(readonly root: string) {}

  // ==========================================================================
  // Unit Artifacts
  // ==========================================================================

  /**
   * Check whether a unit's artifact is present.
   *
   * Extracted units are present when their entries file exists (the
   * singleton categories share the category directory). Translated units are
   * present when their leaf directory exists.
   */
  async exists(slug: string, stage: ArtifactStage, unit: UnitRef): Promise<boolean> {
    const unitDir = getUnitDir(this.root, slug, stage, unit);
    if (stage === 'extracted') {
      return fileExists(path.join(unitDir, ENTRIES_FILE));
    }
    return directoryExists(unitDir);
  }

  /**
   * Read a unit's entry set.
   *
   * @returns The entry set, or null when the unit is absent
   * @throws Error if the artifact exists but is malformed
   */
  async read(slug: string, stage: ArtifactStage, unit: UnitRef): Promise<EntrySet | null> {
    const entriesPath = path.join(getUnitDir(this.root, slug, stage, unit), ENTRIES_FILE);
    if (!(await fileExists(entriesPath))) {
      return null;
    }
    return EntrySetSchema.parse(await readJson(entriesPath));
  }

  /**
   * Read a translated unit's entries together with its record.
   *
   * @returns null when the translated unit is absent or has no record
   */
  async readTranslation(slug: string, unit: UnitRef): Promise<StoredTranslation | null> {
    const unitDir = getUnitDir(this.root, slug, 'translated', unit);
    const recordPath = path.join(unitDir, UNIT_RECORD_FILE);
    if (!(await fileExists(recordPath))) {
      return null;
    }
    const entries = await this.read(slug, 'translated', unit);
    if (entries === null) {
      return null;
    }
    const stored: StoredTranslation = { entries, record: UnitRecordSchema.parse(await readJson(recordPath)) };
    const sourcePath = path.join(unitDir, SOURCE_FILE);
    if (await fileExists(sourcePath)) {
      stored.source = EntrySetSchema.parse(await readJson(sourcePath));
    }
    return stored;
  }

  /**
   * Publish a translated unit (entries, record and source) as one directory.
   */
  async write(
    slug: string,
    stage: 'translated',
    unit: UnitRef,
    data: StoredTranslation
  ): Promise<void> {
    const unitDir = getUnitDir(this.root, slug, stage, unit);
    await publishDirectory(unitDir, async (stagingDir) => {
      await fs.writeFile(path.join(stagingDir, ENTRIES_FILE), serializeJson(data.entries));
      await fs.writeFile(path.join(stagingDir, UNIT_RECORD_FILE), serializeJson(data.record));
      if (data.source !== undefined) {
        await fs.writeFile(path.join(stagingDir, SOURCE_FILE), serializeJson(data.source));
      }
    });
  }

  /**
   * Delete a unit's artifact. Returns false when nothing was there.
   *
   * For the singleton categories this removes the whole category directory,
   * which also forces that category to be re-extracted when stage is
   * 'extracted'.
   */
  async remove(slug: string, stage: ArtifactStage, unit: UnitRef): Promise<boolean> {
    const unitDir = getUnitDir(this.root, slug, stage, unit);
    if (!(await directoryExists(unitDir))) {
      return false;
    }
    await fs.rm(unitDir, { recursive: true, force: true });
    return true;
  }

  // ==========================================================================
  // Category Artifacts (Extract)
  // ==========================================================================

  /**
   * Check whether a category has been extracted (successfully, possibly
   * with zero units).
   */
  async categoryExists(slug: string, stage: ArtifactStage, category: UnitCategory): Promise<boolean> {
    return directoryExists(getCategoryDir(this.root, slug, stage, category));
  }

  /**
   * Publish a category's extracted units in one rename.
   *
   * The mod category also records its unit names in units.json, so a single
   * deleted leaf can later be told apart from a mod that was never there.
   *
   * @param units - Unit name -> entries. For singleton categories the map
   *   holds at most the sentinel name; an empty map records "extracted,
   *   nothing found".
   */
  async writeCategory(
    slug: string,
    category: UnitCategory,
    units: ReadonlyMap<string, EntrySet>
  ): Promise<void> {
    const categoryDir = getCategoryDir(this.root, slug, 'extracted', category);

    await publishDirectory(categoryDir, async (stagingDir) => {
      for (const [name, entries] of units) {
        if (category === 'mod') {
          validateIdSecurity(name, 'unit name');
          const unitDir = path.join(stagingDir, name);
          await fs.mkdir(unitDir, { recursive: true });
          await fs.writeFile(path.join(unitDir, ENTRIES_FILE), serializeJson(entries));
        } else {
          await fs.writeFile(path.join(stagingDir, ENTRIES_FILE), serializeJson(entries));
        }
      }
      if (category === 'mod') {
        const names = [...units.keys()].sort();
        await fs.writeFile(path.join(stagingDir, UNIT_INDEX_FILE), serializeJson(names));
      }
    });
  }

  /**
   * Mod units recorded in the category index whose extracted leaf is gone.
   * Singleton categories have no separate leaves and always return [].
   */
  async listMissingUnits(slug: string, category: UnitCategory): Promise<string[]> {
    if (category !== 'mod') {
      return [];
    }
    const indexPath = path.join(getCategoryDir(this.root, slug, 'extracted', category), UNIT_INDEX_FILE);
    if (!(await fileExists(indexPath))) {
      return [];
    }
    const names = UnitIndexSchema.parse(await readJson(indexPath));
    const missing: string[] = [];
    for (const name of names) {
      if (!(await this.exists(slug, 'extracted', { category, name }))) {
        missing.push(name);
      }
    }
    return missing;
  }

  /**
   * Publish one extracted mod unit into an already extracted category.
   */
  async writeExtractedUnit(slug: string, name: string, entries: EntrySet): Promise<void> {
    const unitDir = getUnitDir(this.root, slug, 'extracted', { category: 'mod', name });
    await publishDirectory(unitDir, async (stagingDir) => {
      await fs.writeFile(path.join(stagingDir, ENTRIES_FILE), serializeJson(entries));
    });
  }

  /**
   * List the unit names present in a category, unsorted.
   * Hidden staging directories are ignored.
   */
  async listUnitNames(slug: string, stage: ArtifactStage, category: UnitCategory): Promise<string[]> {
    const categoryDir = getCategoryDir(this.root, slug, stage, category);

    if (category !== 'mod') {
      const present = await this.exists(slug, stage, { category, name: category });
      return present ? [category] : [];
    }

    try {
      const entries = await fs.readdir(categoryDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
        .map((entry) => entry.name);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  /**
   * Delete a whole category directory of a stage.
   */
  async removeCategory(slug: string, stage: ArtifactStage, category: UnitCategory): Promise<boolean> {
    const categoryDir = getCategoryDir(this.root, slug, stage, category);
    if (!(await directoryExists(categoryDir))) {
      return false;
    }
    await fs.rm(categoryDir, { recursive: true, force: true });
    return true;
  }

  // ==========================================================================
  // Download Artifact
  // ==========================================================================

  /**
   * Check whether the modpack has been downloaded and installed.
   * The raw archive is written last, so its presence implies the rest.
   */
  async downloadExists(slug: string): Promise<boolean> {
    return (
      (await fileExists(getArchivePath(this.root, slug))) &&
      (await directoryExists(getInstanceDir(this.root, slug)))
    );
  }

  /**
   * Persist a downloaded modpack.
   *
   * @param install - Unpacks the archive into the staging instance directory
   */
  async writeDownload(
    slug: string,
    artifact: DownloadArtifact,
    install: (instanceDir: string) => Promise<void>
  ): Promise<void> {
    await publishDirectory(getInstanceDir(this.root, slug), install);
    await atomicWriteFile(getModpackInfoPath(this.root, slug), serializeJson(artifact.info));
    await atomicWriteFile(getArchivePath(this.root, slug), artifact.archive);
  }

  /**
   * Read the metadata of a downloaded modpack.
   *
   * @returns null when no download is recorded
   */
  async readModpackInfo(slug: string): Promise<ModpackInfo | null> {
    const infoPath = getModpackInfoPath(this.root, slug);
    if (!(await fileExists(infoPath))) {
      return null;
    }
    return ModpackInfoSchema.parse(await readJson(infoPath));
  }

  /**
   * Directory of the installed modpack tree.
   */
  instanceDir(slug: string): string {
    return getInstanceDir(this.root, slug);
  }
}
