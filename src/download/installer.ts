/**
 * Modpack Installer
 *
 * Unpacks a CurseForge modpack archive into an instance directory: the
 * overrides folder becomes the instance root and the manifest's mod files
 * are downloaded into mods/.
 *
 * @module download/installer
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import AdmZip from 'adm-zip';
import { CurseForgeManifestSchema, type CurseForgeManifest } from '../schemas/modpack.js';
import type { Logger, ModpackSource } from '../pipeline/types.js';
import { ConcurrencyLimiter } from '../pipeline/concurrency.js';
import { stripBom } from '../storage/atomic.js';
import { DistributionBlockedError } from './curseforge.js';

export interface InstallOptions {
  source: ModpackSource;
  logger: Logger;
  /** Parallel mod downloads (default: 4) */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface InstallResult {
  overrideFiles: number;
  modFiles: number;
  /** Mod files whose authors disabled third-party downloads */
  blocked: string[];
}

/**
 * Read and validate manifest.json from a modpack archive.
 *
 * @throws Error if the archive has no valid manifest
 */
export function readManifest(archive: Buffer | AdmZip): CurseForgeManifest {
  const zip = Buffer.isBuffer(archive) ? new AdmZip(archive) : archive;
  const entry = zip.getEntry('manifest.json');
  if (!entry) {
    throw new Error('Missing CurseForge manifest.json');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(zip.readAsText(entry)));
  } catch (error) {
    throw new Error('Invalid CurseForge manifest.json', { cause: error });
  }

  const parsed = CurseForgeManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid CurseForge manifest.json: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/**
 * Reject entry paths that would escape the instance directory.
 */
export function isSafeRelative(rel: string): boolean {
  if (!rel || path.isAbsolute(rel) || rel.startsWith('/')) return false;
  return !rel.split('/').includes('..');
}

/**
 * Install a modpack archive into instanceDir.
 *
 * @throws Error on an invalid archive or a failed mod download
 */
export async function installModpack(
  archive: Buffer,
  instanceDir: string,
  options: InstallOptions
): Promise<InstallResult> {
  const zip = new AdmZip(archive);
  const manifest = readManifest(zip);
  const prefix = `${manifest.overrides}/`;

  let overrideFiles = 0;
  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) continue;
    const entryName = entry.entryName.replace(/\\/g, '/');
    if (!entryName.startsWith(prefix)) continue;
    const rel = entryName.slice(prefix.length);
    if (!isSafeRelative(rel)) {
      options.logger.warn(`Skipping unsafe archive entry: ${entryName}`);
      continue;
    }
    const out = path.join(instanceDir, rel);
    await fs.mkdir(path.dirname(out), { recursive: true });
    await fs.writeFile(out, entry.getData());
    overrideFiles++;
  }

  const modsDir = path.join(instanceDir, 'mods');
  await fs.mkdir(modsDir, { recursive: true });

  const limiter = new ConcurrencyLimiter(options.concurrency ?? 4);
  const blocked: string[] = [];
  let modFiles = 0;

  const results = await Promise.allSettled(
    manifest.files.map((file) =>
      limiter.run(async () => {
        const fetched = await options.source.fetchModFile(file, options.signal);
        const name = path.basename(fetched.fileName);
        await fs.writeFile(path.join(modsDir, name), fetched.data);
        modFiles++;
      })
    )
  );

  const failures: string[] = [];
  results.forEach((result, index) => {
    if (result.status === 'fulfilled') return;
    const file = manifest.files[index];
    if (result.reason instanceof DistributionBlockedError) {
      blocked.push(result.reason.fileName);
      options.logger.warn(`${result.reason.message}; lang files of this mod will be missing`);
      return;
    }
    const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
    if (!file.required) {
      options.logger.warn(`Optional mod ${file.projectID}/${file.fileID} failed: ${message}`);
      return;
    }
    failures.push(`${file.projectID}/${file.fileID}: ${message}`);
  });

  if (failures.length > 0) {
    throw new Error(`${failures.length} mod download(s) failed: ${failures.join('; ')}`);
  }

  options.logger.debug(`Installed ${overrideFiles} override files and ${modFiles} mods`);
  return { overrideFiles, modFiles, blocked: blocked.sort() };
}
