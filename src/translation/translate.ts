/**
 * Entry Translation
 *
 * Resolves one unit's entries: dictionary first, then a previous
 * translation of the same source text, then the LLM for the remaining
 * misses (when enabled), else the English text passes through and the key
 * is flagged as untranslated. Blank values pass through unflagged.
 *
 * @module translation/translate
 */

import type { EntrySet, TranslatedEntrySet, TranslationSource } from '../schemas/unit.js';
import type { BatchTranslator, DictionaryLookup } from '../pipeline/types.js';

export interface TranslateEntriesOptions {
  dictionary: DictionaryLookup;
  /** Absent when LLM translation is disabled */
  translator?: BatchTranslator;
  /** Source texts per LLM request */
  batchSize: number;
  /** Per-request timeout */
  timeoutMs: number;
  /** Earlier translation of the unit, reused for keys whose text is unchanged */
  previous?: PreviousTranslation;
  signal?: AbortSignal;
}

export interface PreviousTranslation {
  /** Source entries the earlier translation was made from */
  source: EntrySet;
  entries: EntrySet;
  untranslatedKeys: readonly string[];
}

export interface TranslationCounts {
  total: number;
  dictionary: number;
  llm: number;
  passthrough: number;
}

export interface TranslationOutcome extends TranslatedEntrySet {
  /** Reused values are counted under llm */
  counts: TranslationCounts;
  /** Keys taken from the previous translation */
  reused: number;
}

function reusableValue(previous: PreviousTranslation | undefined, key: string, text: string): string | undefined {
  if (previous === undefined || previous.source[key] !== text || previous.untranslatedKeys.includes(key)) {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(previous.entries, key) ? previous.entries[key] : undefined;
}

/**
 * Split items into consecutive batches of at most `size`.
 */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

/**
 * Translate an entry set. Output keys keep the input order.
 *
 * @throws Error from the translator once its retries are exhausted
 */
export async function translateEntries(
  entries: EntrySet,
  options: TranslateEntriesOptions
): Promise<TranslationOutcome> {
  const resolved = new Map<string, { value: string; source: TranslationSource; flagged: boolean }>();
  const misses: Array<[string, string]> = [];
  let reused = 0;

  for (const [key, text] of Object.entries(entries)) {
    if (text.trim() === '') {
      resolved.set(key, { value: text, source: 'passthrough', flagged: false });
      continue;
    }
    const hit = options.dictionary.lookup(key, text);
    if (hit !== undefined) {
      resolved.set(key, { value: hit, source: 'dictionary', flagged: false });
      continue;
    }
    const earlier = reusableValue(options.previous, key, text);
    if (earlier !== undefined) {
      resolved.set(key, { value: earlier, source: 'llm', flagged: false });
      reused++;
    } else {
      misses.push([key, text]);
    }
  }

  const llmResults = new Map<string, string>();
  if (options.translator && misses.length > 0) {
    const uniqueTexts = [...new Set(misses.map(([, text]) => text))];
    for (const batch of toBatches(uniqueTexts, options.batchSize)) {
      const translations = await options.translator.translateBatch(batch, {
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      });
      batch.forEach((text, index) => {
        const translation = translations[index];
        if (translation !== null && translation !== undefined) {
          llmResults.set(text, translation);
        }
      });
    }
  }

  for (const [key, text] of misses) {
    const translation = llmResults.get(text);
    resolved.set(
      key,
      translation !== undefined
        ? { value: translation, source: 'llm', flagged: false }
        : { value: text, source: 'passthrough', flagged: true }
    );
  }

  const counts: TranslationCounts = { total: 0, dictionary: 0, llm: 0, passthrough: 0 };
  const translated: EntrySet = {};
  const untranslatedKeys: string[] = [];

  for (const key of Object.keys(entries)) {
    const entry = resolved.get(key);
    if (entry === undefined) continue;
    translated[key] = entry.value;
    counts.total++;
    counts[entry.source]++;
    if (entry.flagged) {
      untranslatedKeys.push(key);
    }
  }

  return { entries: translated, untranslatedKeys, counts, reused };
}
