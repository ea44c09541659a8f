/**
 * Localization Packager
 *
 * Turns translated units into the two distributable archives:
 *
 * | Kind         | Units              | Archive content                                         |
 * |--------------|--------------------|---------------------------------------------------------|
 * | resourcepack | mod, kubejs        | pack.mcmeta + assets/<namespace>/lang/<targetLang>.json |
 * | overrides    | ftbquests          | config/ftbquests/quests/lang/<targetLang>.snbt          |
 *
 * Units with no entries contribute nothing. Output depends only on the
 * input entries and settings.
 *
 * @module export/packager
 */

import type { EntrySet } from '../schemas/unit.js';
import type { PackageUnit, Packager } from '../pipeline/types.js';
import type { PackageKind } from '../storage/paths.js';
import { serializeJson } from '../storage/atomic.js';
import { QUEST_LANG_DIR } from '../extractors/ftbquests.js';
import { stringifySnbtLang, toSnbtLang } from '../extractors/snbt.js';
import { createZipBuffer, type ZipFileEntry } from './zip.js';

export interface PackagerSettings {
  targetLang: string;
  packFormat: number;
  /** pack.mcmeta description */
  description: string;
}

/**
 * Resource-pack namespace a unit's entries are written under.
 * Returns null for units that do not belong in the resource pack.
 */
export function resourcePackNamespace(unit: PackageUnit['unit']): string | null {
  switch (unit.category) {
    case 'mod':
      return unit.name;
    case 'kubejs':
      return 'kubejs';
    case 'ftbquests':
      return null;
  }
}

/**
 * pack.mcmeta content.
 */
export function createPackMcmeta(packFormat: number, description: string): string {
  return serializeJson({
    pack: {
      pack_format: packFormat,
      description,
    },
  });
}

/**
 * Merge unit entries that land on the same archive path, in unit order.
 */
function mergeByPath(
  units: readonly PackageUnit[],
  pathOf: (unit: PackageUnit['unit']) => string | null
): Map<string, EntrySet> {
  const merged = new Map<string, EntrySet>();
  for (const { unit, entries } of units) {
    const target = pathOf(unit);
    if (target === null || Object.keys(entries).length === 0) {
      continue;
    }
    merged.set(target, { ...merged.get(target), ...entries });
  }
  return merged;
}

function byName(a: ZipFileEntry, b: ZipFileEntry): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export class ArchivePackager implements Packager {
  constructor(private readonly settings: PackagerSettings) {}

  /**
   * Files of an archive, in archive order.
   */
  buildFiles(units: readonly PackageUnit[], kind: PackageKind): ZipFileEntry[] {
    const { targetLang } = this.settings;

    if (kind === 'resourcepack') {
      const langFiles = [
        ...mergeByPath(units, (unit) => {
          const namespace = resourcePackNamespace(unit);
          return namespace === null ? null : `assets/${namespace}/lang/${targetLang}.json`;
        }),
      ].map(([name, entries]) => ({ name, content: serializeJson(entries) }));

      return [
        { name: 'pack.mcmeta', content: createPackMcmeta(this.settings.packFormat, this.settings.description) },
        ...langFiles.sort(byName),
      ];
    }

    return [
      ...mergeByPath(units, (unit) =>
        unit.category === 'ftbquests' ? `${QUEST_LANG_DIR}/${targetLang}.snbt` : null
      ),
    ]
      .map(([name, entries]) => ({ name, content: stringifySnbtLang(toSnbtLang(entries)) }))
      .sort(byName);
  }

  async buildArchive(units: readonly PackageUnit[], kind: PackageKind): Promise<Buffer> {
    return createZipBuffer(this.buildFiles(units, kind));
  }
}
