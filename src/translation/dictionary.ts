/**
 * Translation Dictionary
 *
 * Exact-match lookup in three layers, checked in order:
 *   1. keyOverrides  (lang key -> translation)
 *   2. terminology   (source text -> translation, from the config file)
 *   3. Dict-Mini     (source text -> ranked translations, first wins)
 *
 * @module translation/dictionary
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type { AppConfig } from '../config/index.js';
import type { DictionaryLookup, Logger } from '../pipeline/types.js';
import { atomicWriteFile, fileExists, stripBom } from '../storage/atomic.js';
import { getDictionaryCachePath } from '../storage/paths.js';

// ============================================================================
// Schema
// ============================================================================

/**
 * Dict-Mini file: English text -> translations sorted by frequency.
 */
export const DictMiniSchema = z.record(z.string(), z.array(z.string()));

export type DictMini = z.infer<typeof DictMiniSchema>;

/** Upper bound of reference entries given to the LLM per batch */
export const MAX_CONTEXT_ENTRIES = 100;

// ============================================================================
// Dictionary
// ============================================================================

export interface DictionaryLayers {
  keyOverrides?: Readonly<Record<string, string>>;
  terminology?: Readonly<Record<string, string>>;
  dictMini?: DictMini;
}

export class Dictionary implements DictionaryLookup {
  private readonly keyOverrides: Map<string, string>;
  private readonly bySource: Map<string, string>;

  constructor(layers: DictionaryLayers = {}) {
    this.keyOverrides = new Map(Object.entries(layers.keyOverrides ?? {}));

    this.bySource = new Map();
    for (const [source, ranked] of Object.entries(layers.dictMini ?? {})) {
      if (ranked.length > 0) {
        this.bySource.set(source, ranked[0]);
      }
    }
    // Configured terminology outranks the downloaded dictionary
    for (const [source, target] of Object.entries(layers.terminology ?? {})) {
      this.bySource.set(source, target);
    }
  }

  get size(): number {
    return this.bySource.size;
  }

  lookup(key: string, sourceText: string): string | undefined {
    return this.keyOverrides.get(key) ?? this.bySource.get(sourceText);
  }

  /**
   * Dictionary entries whose source text contains a word of the given
   * texts, as reference material for the LLM.
   *
   * Words are runs of ASCII letters of length two or more; each is also
   * tried lowercased and capitalized.
   */
  relatedEntries(texts: readonly string[], limit = MAX_CONTEXT_ENTRIES): Array<[string, string]> {
    const words = new Set<string>();
    for (const text of texts) {
      for (const word of text.split(/[^a-zA-Z]+/)) {
        if (word.length >= 2) {
          words.add(word);
          words.add(word.toLowerCase());
          words.add(word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
        }
      }
    }
    if (words.size === 0) {
      return [];
    }

    const related: Array<[string, string]> = [];
    for (const [source, target] of this.bySource) {
      if (related.length >= limit) {
        break;
      }
      for (const word of words) {
        if (source.includes(word)) {
          related.push([source, target]);
          break;
        }
      }
    }
    return related;
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Injected fetch, so tests never reach the network.
 */
export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface LoadDictionaryOptions {
  logger: Logger;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

/**
 * Parse Dict-Mini text.
 *
 * @throws Error if the content is not a Dict-Mini object
 */
export function parseDictMini(text: string, source: string): DictMini {
  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(text));
  } catch (error) {
    throw new Error(`Invalid JSON in dictionary: ${source}`, { cause: error });
  }
  const parsed = DictMiniSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid dictionary format in ${source}: expected {"text": ["translation", ...]}`);
  }
  return parsed.data;
}

async function readDictMiniFile(filePath: string): Promise<DictMini> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Cannot read dictionary: ${filePath}`, { cause: error });
  }
  return parseDictMini(text, filePath);
}

/**
 * Read the Dict-Mini layer: the configured local file, else the cached
 * download, else download it once into the cache.
 *
 * A failed download is logged and yields an empty layer so that the run
 * can proceed on configured terminology; the download is attempted again
 * next run.
 *
 * @throws Error if a local or cached file exists but is malformed
 */
export async function loadDictMini(
  config: AppConfig,
  options: LoadDictionaryOptions
): Promise<DictMini> {
  const { logger } = options;

  if (config.dictionary.path !== undefined) {
    logger.debug(`Using local dictionary: ${config.dictionary.path}`);
    return readDictMiniFile(config.dictionary.path);
  }

  const cachePath = getDictionaryCachePath(config.rootDir);
  if (await fileExists(cachePath)) {
    logger.debug(`Using cached dictionary: ${cachePath}`);
    return readDictMiniFile(cachePath);
  }

  const fetchImpl = options.fetch ?? fetch;
  logger.info(`Downloading dictionary: ${config.dictionary.url}`);

  let text: string;
  try {
    const response = await fetchImpl(config.dictionary.url, { signal: options.signal });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    text = await response.text();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Dictionary download failed, continuing without it: ${message}`);
    return {};
  }

  const dictMini = parseDictMini(text, config.dictionary.url);
  await atomicWriteFile(cachePath, text);
  logger.info(`Dictionary cached (${Object.keys(dictMini).length} entries)`);
  return dictMini;
}

/**
 * Build the full lookup from configuration and the Dict-Mini layer.
 */
export async function loadDictionary(
  config: AppConfig,
  options: LoadDictionaryOptions
): Promise<Dictionary> {
  const dictMini = await loadDictMini(config, options);
  return new Dictionary({
    keyOverrides: config.translation.keyOverrides,
    terminology: config.translation.terminology,
    dictMini,
  });
}
