/**
 * FTB Quests Extractor
 *
 * Reads the 1.20+ lang export: either the single file
 * `quests/lang/en_us.snbt` or the split directory `quests/lang/en_us/`
 * (merged in path order). The quest book lives under config/ftbquests/
 * in current packs and under ftbquests/ in some older ones.
 *
 * @module extractors/ftbquests
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SINGLETON_UNIT_NAMES, type EntrySet } from '../schemas/unit.js';
import type { ExtractedUnits, Extractor, Logger } from '../pipeline/types.js';
import { directoryExists, fileExists, stripBom } from '../storage/atomic.js';
import { listFiles } from './lang-file.js';
import { flattenSnbtLang, parseSnbtLang } from './snbt.js';

/** Quest book roots, relative to the instance, in lookup order */
export const QUEST_ROOTS = ['config/ftbquests/quests', 'ftbquests/quests'] as const;

/** Where translated quest lang files go, relative to the instance */
export const QUEST_LANG_DIR = 'config/ftbquests/quests/lang';

async function readSnbtEntries(filePath: string): Promise<EntrySet> {
  const text = stripBom(await fs.readFile(filePath, 'utf-8'));
  try {
    return flattenSnbtLang(parseSnbtLang(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`${filePath}: ${message}`, { cause: error });
  }
}

export class FtbQuestsExtractor implements Extractor {
  readonly category = 'ftbquests' as const;

  async extract(instanceDir: string, logger: Logger): Promise<ExtractedUnits> {
    const units: ExtractedUnits = new Map();

    for (const root of QUEST_ROOTS) {
      const langDir = path.join(instanceDir, root, 'lang');
      const singleFile = path.join(langDir, 'en_us.snbt');
      const splitDir = path.join(langDir, 'en_us');

      if (await fileExists(singleFile)) {
        const entries = await readSnbtEntries(singleFile);
        units.set(SINGLETON_UNIT_NAMES.ftbquests, entries);
        logger.debug(`FTB Quests: ${Object.keys(entries).length} keys from ${root}/lang/en_us.snbt`);
        return units;
      }

      if (await directoryExists(splitDir)) {
        const files = (await listFiles(splitDir)).filter((rel) => rel.endsWith('.snbt'));
        const merged: EntrySet = {};
        for (const rel of files) {
          Object.assign(merged, await readSnbtEntries(path.join(splitDir, rel)));
        }
        units.set(SINGLETON_UNIT_NAMES.ftbquests, merged);
        logger.debug(`FTB Quests: ${Object.keys(merged).length} keys from ${files.length} split files`);
        return units;
      }
    }

    logger.debug('No FTB Quests lang export found');
    return units;
  }
}
