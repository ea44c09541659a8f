/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using the temp file + rename pattern,
 * the directory-level equivalent used for unit artifacts, and complementary
 * read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

let tempCounter = 0;

/**
 * Build a hidden sibling path for staging a write.
 * Hidden names are never listed as units.
 */
function tempSibling(targetPath: string, label: string): string {
  tempCounter += 1;
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  return path.join(dir, `.${base}.${label}.${process.pid}.${Date.now()}.${tempCounter}`);
}

/**
 * Serialize data as 2-space indented JSON with a trailing newline.
 */
export function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Write bytes or text to a file atomically.
 *
 * Writes to a temp file in the same directory, then renames it over the
 * target. Readers see either the old file or the new one, never a partial
 * write.
 *
 * @param filePath - Destination path
 * @param content - File content
 * @throws Error with file context if the write or rename fails
 */
export async function atomicWriteFile(filePath: string, content: string | Buffer): Promise<void> {
  const tempPath = tempSibling(filePath, 'tmp');

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

/**
 * Write JSON to a file atomically.
 *
 * @param filePath - Destination path
 * @param data - Value to serialize
 *
 * @example
 * await atomicWriteJson('/path/to/file.json', { schemaVersion: 1, ... });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, serializeJson(data));
}

/**
 * Populate a directory and publish it under its final name in one rename.
 *
 * The populate callback fills a hidden staging directory. Only after it
 * resolves is the staging directory renamed to the target, so the target is
 * either absent or complete. An existing target is replaced wholesale.
 *
 * @param targetDir - Final directory path
 * @param populate - Writes the directory content into the staging path
 * @throws Error from populate (staging directory removed) or from the swap
 *
 * @example
 * ```typescript
 * await publishDirectory('/work/pack-a/translated/kubejs', async (dir) => {
 *   await fs.writeFile(path.join(dir, 'entries.json'), '{}\n');
 * });
 * ```
 */
export async function publishDirectory(
  targetDir: string,
  populate: (stagingDir: string) => Promise<void>
): Promise<void> {
  const stagingDir = tempSibling(targetDir, 'staging');
  await fs.mkdir(stagingDir, { recursive: true });

  try {
    await populate(stagingDir);
  } catch (error) {
    await fs.rm(stagingDir, { recursive: true, force: true });
    throw error;
  }

  const retiredDir = tempSibling(targetDir, 'retired');
  const replacing = await directoryExists(targetDir);

  try {
    if (replacing) {
      await fs.rename(targetDir, retiredDir);
    }
    await fs.rename(stagingDir, targetDir);
  } catch (error) {
    await fs.rm(stagingDir, { recursive: true, force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic publish failed for ${targetDir}: ${message}`, {
      cause: error,
    });
  }

  if (replacing) {
    await fs.rm(retiredDir, { recursive: true, force: true });
  }
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }

  try {
    return JSON.parse(stripBom(content));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in file: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Remove a leading UTF-8 byte order mark.
 */
export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a directory exists
 *
 * @param dirPath - Path to check
 * @returns true if a directory exists at dirPath
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
