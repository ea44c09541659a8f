/**
 * KubeJS Extractor
 *
 * Merges every `kubejs/assets/<namespace>/lang/en_us.json` of the instance
 * into the single KubeJS unit, in namespace order.
 *
 * @module extractors/kubejs
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SINGLETON_UNIT_NAMES, type EntrySet } from '../schemas/unit.js';
import type { ExtractedUnits, Extractor, Logger } from '../pipeline/types.js';
import { listFiles, parseLangJson } from './lang-file.js';

const ASSET_LANG_FILE = /^([^/]+)\/lang\/en_us\.json$/;

export class KubeJsExtractor implements Extractor {
  readonly category = 'kubejs' as const;

  async extract(instanceDir: string, logger: Logger): Promise<ExtractedUnits> {
    const assetsDir = path.join(instanceDir, 'kubejs', 'assets');
    const langFiles = (await listFiles(assetsDir)).filter((rel) => ASSET_LANG_FILE.test(rel));

    const units: ExtractedUnits = new Map();
    if (langFiles.length === 0) {
      logger.debug('No KubeJS lang files found');
      return units;
    }

    const merged: EntrySet = {};
    for (const rel of langFiles) {
      const filePath = path.join(assetsDir, rel);
      Object.assign(merged, parseLangJson(await fs.readFile(filePath, 'utf-8'), filePath));
    }

    units.set(SINGLETON_UNIT_NAMES.kubejs, merged);
    logger.debug(`KubeJS: ${langFiles.length} lang files, ${Object.keys(merged).length} keys`);
    return units;
  }
}
