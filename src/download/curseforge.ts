/**
 * CurseForge API Client
 *
 * Resolves a modpack slug to its latest file, downloads the archive, and
 * downloads the mod files its manifest references. Authenticated with the
 * `x-api-key` header.
 *
 * @module download/curseforge
 */

import { z } from 'zod';
import type { ManifestFile } from '../schemas/modpack.js';
import type { FetchedModFile, FetchedModpack, ModpackSource } from '../pipeline/types.js';
import { readManifest } from './installer.js';

// ============================================================================
// Constants
// ============================================================================

export const CURSEFORGE_API_BASE = 'https://api.curseforge.com/v1';

/** CurseForge game id of Minecraft */
export const MINECRAFT_GAME_ID = 432;

/** CurseForge class id of modpacks */
export const MODPACK_CLASS_ID = 4471;

const DEFAULT_TIMEOUT_MS = 60000;

// ============================================================================
// Types
// ============================================================================

/**
 * CurseForge API error with additional context
 */
export class CurseForgeApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'CurseForgeApiError';
  }
}

/**
 * Raised when a mod author has disabled third-party downloads.
 */
export class DistributionBlockedError extends CurseForgeApiError {
  constructor(public readonly fileName: string) {
    super(`Third-party download disabled for ${fileName}`, 403, false);
    this.name = 'DistributionBlockedError';
  }
}

const FileSchema = z.object({
  id: z.number().int(),
  modId: z.number().int().optional(),
  fileName: z.string(),
  fileDate: z.string(),
  downloadUrl: z.string().nullable().optional(),
});

export type CurseForgeFile = z.infer<typeof FileSchema>;

const ModSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  slug: z.string(),
  mainFileId: z.number().int().optional(),
  latestFiles: z.array(FileSchema).default([]),
});

export type CurseForgeMod = z.infer<typeof ModSchema>;

const SearchResponseSchema = z.object({ data: z.array(ModSchema) });
const FileResponseSchema = z.object({ data: FileSchema });
const DownloadUrlResponseSchema = z.object({ data: z.string().nullable() });

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface CurseForgeClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests */
  fetch?: FetchLike;
}

/**
 * Newest CurseForge file of a modpack compared with the downloaded one.
 */
export interface UpdateCheck {
  currentFileId: number;
  latestFileId: number;
  latestFileName: string;
  updateAvailable: boolean;
}

// ============================================================================
// File Selection
// ============================================================================

/**
 * Pick the file to install: the project's main file when it is among the
 * latest files, else the newest by file date.
 */
export function selectLatestFile(mod: CurseForgeMod): CurseForgeFile | undefined {
  const main = mod.latestFiles.find((file) => file.id === mod.mainFileId);
  if (main) {
    return main;
  }
  return [...mod.latestFiles].sort((a, b) => Date.parse(b.fileDate) - Date.parse(a.fileDate))[0];
}

// ============================================================================
// Client
// ============================================================================

export class CurseForgeClient implements ModpackSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CurseForgeClientOptions) {
    this.baseUrl = options.baseUrl ?? CURSEFORGE_API_BASE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Find a modpack project by slug.
   *
   * @throws CurseForgeApiError (404) when no modpack has that slug
   */
  async findModpack(slug: string, signal?: AbortSignal): Promise<CurseForgeMod> {
    const query = new URLSearchParams({
      gameId: String(MINECRAFT_GAME_ID),
      classId: String(MODPACK_CLASS_ID),
      slug,
    });
    const body = await this.getJson(`${this.baseUrl}/mods/search?${query}`, signal);
    const mod = SearchResponseSchema.parse(body).data.find((candidate) => candidate.slug === slug);
    if (!mod) {
      throw new CurseForgeApiError(`Modpack not found: ${slug}`, 404, false);
    }
    return mod;
  }

  /**
   * Check whether CurseForge offers a newer file than the one downloaded.
   * Nothing is downloaded.
   *
   * @throws CurseForgeApiError when the modpack or its files are not found
   */
  async checkForUpdate(slug: string, currentFileId: number, signal?: AbortSignal): Promise<UpdateCheck> {
    const mod = await this.findModpack(slug, signal);
    const file = selectLatestFile(mod);
    if (!file) {
      throw new CurseForgeApiError(`Modpack ${slug} has no files`, 404, false);
    }
    return {
      currentFileId,
      latestFileId: file.id,
      latestFileName: file.fileName,
      updateAvailable: file.id !== currentFileId,
    };
  }

  async fetch(slug: string, signal?: AbortSignal): Promise<FetchedModpack> {
    const mod = await this.findModpack(slug, signal);
    const file = selectLatestFile(mod);
    if (!file) {
      throw new CurseForgeApiError(`Modpack ${slug} has no files`, 404, false);
    }

    const archive = await this.downloadFile(mod.id, file, signal);
    const manifest = readManifest(archive);

    return {
      archive,
      info: {
        slug,
        name: manifest.name || mod.name,
        version: manifest.version,
        projectId: mod.id,
        fileId: file.id,
        fileName: file.fileName,
        mcVersion: manifest.minecraft.version,
      },
    };
  }

  async fetchModFile(file: ManifestFile, signal?: AbortSignal): Promise<FetchedModFile> {
    const body = await this.getJson(`${this.baseUrl}/mods/${file.projectID}/files/${file.fileID}`, signal);
    const info = FileResponseSchema.parse(body).data;
    return {
      fileName: info.fileName,
      data: await this.downloadFile(file.projectID, info, signal),
    };
  }

  /**
   * Download a file's bytes, asking the API for a URL when the file record
   * carries none.
   *
   * @throws DistributionBlockedError when no URL is available
   */
  private async downloadFile(modId: number, file: CurseForgeFile, signal?: AbortSignal): Promise<Buffer> {
    let url = file.downloadUrl ?? null;
    if (url === null) {
      const body = await this.getJson(`${this.baseUrl}/mods/${modId}/files/${file.id}/download-url`, signal);
      url = DownloadUrlResponseSchema.parse(body).data;
    }
    if (url === null) {
      throw new DistributionBlockedError(file.fileName);
    }

    const response = await this.fetchWithTimeout(url, {}, signal);
    if (!response.ok) {
      await this.handleHttpError(response);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetchWithTimeout(
      url,
      { headers: { 'x-api-key': this.options.apiKey, Accept: 'application/json' } },
      signal
    );
    if (!response.ok) {
      await this.handleHttpError(response);
    }
    return response.json();
  }

  /**
   * Execute fetch with timeout using AbortController.
   *
   * @throws CurseForgeApiError (408) on timeout
   */
  private async fetchWithTimeout(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new CurseForgeApiError(`Request timed out after ${this.timeoutMs}ms`, 408, true);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * @throws CurseForgeApiError with a message for the status
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');
    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 401 || response.status === 403) {
      message = 'Authentication failed: invalid or unauthorized CurseForge API key';
    } else if (response.status === 429) {
      message = `Rate limited: ${text}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${text}`;
    } else {
      message = `API error (${response.status}): ${text}`;
    }

    throw new CurseForgeApiError(message, response.status, isRetryable);
  }
}
