/**
 * Application Configuration File Schema
 *
 * Shape of localization.config.json. Every field has a default so that a
 * file containing only the slug list is valid.
 *
 * @module schemas/app-config
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { SlugSchema } from './common.js';

/**
 * Default Dict-Mini release asset (English -> ranked Chinese translations).
 */
export const DEFAULT_DICTIONARY_URL =
  'https://github.com/VM-Chinese-translate-group/i18n-Dict-Extender/releases/latest/download/Dict-Mini.json';

export const LlmSettingsSchema = z.object({
  /** Send dictionary misses to the LLM */
  enabled: z.boolean().default(false),
  /** Model id; OPENAI_MODEL_ID overrides it */
  model: z.string().default('gpt-4o-mini'),
  /** Source texts per request */
  batchSize: z.number().int().positive().default(50),
  temperature: z.number().min(0).max(2).default(0.3),
  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(30000),
  /** Retries per batch after the first attempt */
  maxRetries: z.number().int().nonnegative().default(3),
});

export type LlmSettings = z.infer<typeof LlmSettingsSchema>;

export const AppConfigFileSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.appConfig),

  modpacks: z.object({
    slugs: z.array(SlugSchema).min(1, 'At least one modpack slug is required'),
  }),

  translation: z
    .object({
      /** Minecraft locale code of the output language */
      targetLang: z
        .string()
        .regex(/^[a-z]{2,3}_[a-z]{2,3}$/, 'targetLang must look like "zh_cn"')
        .default('zh_cn'),
      /** pack.mcmeta pack_format of the resource pack */
      packFormat: z.number().int().positive().default(34),
      /** Source text -> translation, checked before the downloaded dictionary */
      terminology: z.record(z.string(), z.string()).default({}),
      /** Lang key -> translation, checked before any source-text match */
      keyOverrides: z.record(z.string(), z.string()).default({}),
      llm: LlmSettingsSchema.default({}),
    })
    .default({}),

  dictionary: z
    .object({
      /** Local Dict-Mini style file; takes precedence over url */
      path: z.string().optional(),
      /** Downloaded once and cached under the work tree */
      url: z.string().url().default(DEFAULT_DICTIONARY_URL),
    })
    .default({}),

  concurrency: z
    .object({
      units: z.number().int().positive().default(4),
      modpacks: z.number().int().positive().default(1),
    })
    .default({}),

  paths: z
    .object({
      /** Directory holding work/ and output/ */
      root: z.string().default('.'),
    })
    .default({}),
});

export type AppConfigFile = z.infer<typeof AppConfigFileSchema>;
