/**
 * ZIP Archive Module
 *
 * Builds ZIP archives in memory with the 'archiver' library. Archives are
 * deterministic: entries keep the order they are given in and carry a fixed
 * modification time, so equal input gives byte-identical output.
 *
 * @module export/zip
 */

import archiver from 'archiver';

// ============================================================================
// Types
// ============================================================================

/**
 * One file of an archive.
 */
export interface ZipFileEntry {
  /** POSIX-style path inside the archive */
  name: string;
  content: string | Buffer;
}

/**
 * Options for ZIP archive creation
 */
export interface ZipOptions {
  /** Compression level (0-9, default 6) */
  compressionLevel?: number;
}

/**
 * Modification time stamped on every entry.
 */
export const FIXED_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));

// ============================================================================
// Archive Creation
// ============================================================================

/**
 * Create a ZIP archive from in-memory files.
 *
 * @param files - Entries in archive order
 * @returns The archive bytes
 * @throws Error on duplicate or unsafe entry names, or if archiver fails
 *
 * @example
 * ```typescript
 * const zip = await createZipBuffer([{ name: 'pack.mcmeta', content: '{}\n' }]);
 * ```
 */
export async function createZipBuffer(
  files: readonly ZipFileEntry[],
  options: ZipOptions = {}
): Promise<Buffer> {
  const seen = new Set<string>();
  for (const file of files) {
    if (file.name.startsWith('/') || file.name.split('/').includes('..') || file.name.includes('\\')) {
      throw new Error(`Unsafe archive entry name: ${file.name}`);
    }
    if (seen.has(file.name)) {
      throw new Error(`Duplicate archive entry: ${file.name}`);
    }
    seen.add(file.name);
  }

  return new Promise<Buffer>((resolve, reject) => {
    const archive = archiver('zip', {
      zlib: { level: options.compressionLevel ?? 6 },
    });
    const chunks: Buffer[] = [];

    archive.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    archive.on('end', () => {
      resolve(Buffer.concat(chunks));
    });

    archive.on('warning', (err) => {
      reject(new Error(`Archive creation failed: ${err.message}`));
    });

    archive.on('error', (err) => {
      reject(new Error(`Archive creation failed: ${err.message}`));
    });

    for (const file of files) {
      const content = typeof file.content === 'string' ? Buffer.from(file.content, 'utf-8') : file.content;
      archive.append(content, { name: file.name, date: FIXED_ENTRY_DATE, mode: 0o644 });
    }

    archive.finalize().catch((err: unknown) => {
      reject(err instanceof Error ? err : new Error(String(err)));
    });
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Formats a file size in human-readable format.
 *
 * @param bytes - Size in bytes
 * @returns Formatted string (e.g., "1.5 MB")
 */
export function formatFileSize(bytes: number): string {
  if (bytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  const size = bytes / Math.pow(1024, i);

  if (i === 0) {
    return `${bytes} B`;
  } else if (size >= 100) {
    return `${Math.round(size)} ${units[i]}`;
  } else if (size >= 10) {
    return `${size.toFixed(1)} ${units[i]}`;
  } else {
    return `${size.toFixed(2)} ${units[i]}`;
  }
}
