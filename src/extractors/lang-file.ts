/**
 * Helpers shared by the extractors.
 *
 * @module extractors/lang-file
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { EntrySet } from '../schemas/unit.js';
import { stripBom } from '../storage/atomic.js';

/**
 * Parse a Minecraft JSON lang file into an entry set.
 * Non-string values are dropped; key order is kept.
 *
 * @throws Error if the text is not a JSON object
 */
export function parseLangJson(text: string, source: string): EntrySet {
  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(text));
  } catch (error) {
    throw new Error(`Invalid JSON in lang file: ${source}`, { cause: error });
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Lang file is not a JSON object: ${source}`);
  }

  const entries: EntrySet = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      entries[key] = value;
    }
  }
  return entries;
}

/**
 * List the files under a directory, recursively, as sorted POSIX-style
 * relative paths. A missing directory yields an empty list.
 */
export async function listFiles(dir: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (current: string, prefix: string): Promise<void> => {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      throw error;
    }
    for (const dirent of dirents) {
      const rel = prefix ? `${prefix}/${dirent.name}` : dirent.name;
      if (dirent.isDirectory()) {
        await walk(path.join(current, dirent.name), rel);
      } else if (dirent.isFile()) {
        found.push(rel);
      }
    }
  };

  await walk(dir, '');
  return found.sort();
}
