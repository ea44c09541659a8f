/**
 * Mod Jar Extractor
 *
 * Reads `assets/<namespace>/lang/en_us.json` from every jar in the
 * instance's mods/ directory. Each namespace is one unit; a namespace whose
 * lang file is empty still yields a (empty) unit. When several jars ship the
 * same namespace, they are merged in jar file-name order, later keys
 * replacing earlier ones.
 *
 * @module extractors/mods
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import AdmZip from 'adm-zip';
import type { EntrySet } from '../schemas/unit.js';
import type { ExtractedUnits, Extractor, Logger } from '../pipeline/types.js';
import { parseLangJson } from './lang-file.js';

const LANG_ENTRY = /^assets\/([a-z0-9_-][a-z0-9_.-]*)\/lang\/en_us\.json$/;

/**
 * Lang files found in one jar, keyed by namespace.
 */
export function readJarLangFiles(jar: AdmZip, jarName: string, logger: Logger): Map<string, EntrySet> {
  const found = new Map<string, EntrySet>();

  for (const entry of jar.getEntries()) {
    if (entry.isDirectory) continue;
    const entryName = entry.entryName.replace(/\\/g, '/');
    const match = LANG_ENTRY.exec(entryName);
    if (!match) continue;

    const namespace = match[1];
    try {
      found.set(namespace, parseLangJson(jar.readAsText(entry), `${jarName}!/${entryName}`));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Skipping unreadable lang file: ${message}`);
    }
  }

  return found;
}

export class ModJarExtractor implements Extractor {
  readonly category = 'mod' as const;

  async extract(instanceDir: string, logger: Logger): Promise<ExtractedUnits> {
    const modsDir = path.join(instanceDir, 'mods');
    const units: ExtractedUnits = new Map();

    let jarNames: string[];
    try {
      jarNames = (await fs.readdir(modsDir))
        .filter((name) => name.toLowerCase().endsWith('.jar'))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.warn(`No mods/ directory found at ${modsDir}`);
        return units;
      }
      throw error;
    }

    for (const jarName of jarNames) {
      let jar: AdmZip;
      try {
        jar = new AdmZip(await fs.readFile(path.join(modsDir, jarName)));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Skipping unreadable jar ${jarName}: ${message}`);
        continue;
      }

      for (const [namespace, entries] of readJarLangFiles(jar, jarName, logger)) {
        units.set(namespace, { ...units.get(namespace), ...entries });
      }
    }

    logger.debug(`Mod jars: ${jarNames.length} scanned, ${units.size} lang namespaces`);
    return units;
  }
}
