/**
 * Package Stage
 *
 * Rebuilds both archives from every unit present after Translate. A unit
 * without a usable translation contributes its English text. Never cached:
 * the archives always reflect the current translated state.
 *
 * @module stages/package
 */

import * as path from 'node:path';
import type { EntrySet, UnitKey } from '../schemas/unit.js';
import { PackageError, errorMessage } from '../pipeline/errors.js';
import type {
  ArchiveInfo,
  ModpackRun,
  PackageUnit,
  Stage,
  StageContext,
  StageReport,
} from '../pipeline/types.js';
import { UnitResolver } from '../pipeline/resolver.js';
import type { ArtifactStore } from '../storage/artifact-store.js';
import { atomicWriteFile, atomicWriteJson } from '../storage/atomic.js';
import { getPackagePath, getVersionFilePath, type PackageKind } from '../storage/paths.js';
import { ReportBuilder } from './report.js';

/**
 * A unit's package contribution: its extracted keys, each taking the
 * translated value when one is present.
 */
export async function collectUnitEntries(
  store: ArtifactStore,
  unit: UnitKey
): Promise<EntrySet> {
  const extracted = (await store.read(unit.slug, 'extracted', unit)) ?? {};
  const translated = (await store.read(unit.slug, 'translated', unit)) ?? {};

  const entries: EntrySet = {};
  for (const [key, english] of Object.entries(extracted)) {
    entries[key] = Object.prototype.hasOwnProperty.call(translated, key) ? translated[key] : english;
  }
  return entries;
}

export const packageStage: Stage = {
  name: 'package',

  async execute(context: StageContext, run: ModpackRun): Promise<StageReport> {
    const { slug, store, collaborators, config, logger } = context;
    const report = new ReportBuilder('package');

    try {
      const units = run.units ?? (await new UnitResolver(store).resolve(slug));
      const contributions: PackageUnit[] = [];
      for (const unit of units) {
        contributions.push({ unit, entries: await collectUnitEntries(store, unit) });
      }

      const writeArchive = async (kind: PackageKind): Promise<ArchiveInfo> => {
        const bytes = await collaborators.packager.buildArchive(contributions, kind);
        const archivePath = getPackagePath(config.rootDir, slug, kind);
        await atomicWriteFile(archivePath, bytes);
        const unitCount = contributions.filter(
          ({ unit, entries }) =>
            Object.keys(entries).length > 0 && (kind === 'overrides') === (unit.category === 'ftbquests')
        ).length;
        report.executedTarget(kind);
        logger.info(`[${slug}] Wrote ${path.basename(archivePath)} (${unitCount} unit(s))`);
        return { path: archivePath, sizeBytes: bytes.length, unitCount };
      };

      const packages = {
        resourcepack: await writeArchive('resourcepack'),
        overrides: await writeArchive('overrides'),
      };

      const modpack = run.modpack ?? (await store.readModpackInfo(slug));
      await atomicWriteJson(getVersionFilePath(config.rootDir, slug), {
        slug,
        targetLang: config.translation.targetLang,
        modpack: modpack ?? null,
        units: units.length,
      });

      run.packages = packages;
    } catch (error) {
      throw new PackageError(slug, `Packaging failed: ${errorMessage(error)}`, { cause: error });
    }

    return report.build();
  },
};
