/**
 * Configuration Module
 *
 * Builds the single immutable AppConfig value a run uses, from
 * localization.config.json and the environment (.env loaded by dotenv).
 * Uses Zod for validation with sensible defaults. The CLI calls this once
 * and threads the result through the pipeline; nothing else reads the
 * environment.
 *
 * @module config
 */

import 'dotenv/config';
import * as path from 'node:path';
import { z } from 'zod';
import { AppConfigFileSchema, type LlmSettings } from '../schemas/app-config.js';
import { fileExists, readJson } from '../storage/atomic.js';

/** Config file looked up in the working directory when none is given */
export const DEFAULT_CONFIG_FILE = 'localization.config.json';

// ============================================================================
// Environment
// ============================================================================

/**
 * Optional string variable; blank values count as unset.
 */
const optionalVar = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalVar,
  OPENAI_BASE_URL: optionalVar,
  OPENAI_MODEL_ID: optionalVar,
  CURSEFORGE_API_KEY: optionalVar,
  LOCALIZATION_ROOT: optionalVar,
  LOCALIZATION_CONFIG: optionalVar,
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse the variables the pipeline reads.
 *
 * @param source - Variables to read (default: process.env)
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

// ============================================================================
// AppConfig
// ============================================================================

/**
 * Resolved, frozen configuration for one invocation.
 */
export interface AppConfig {
  /** Absolute directory holding work/ and output/ */
  readonly rootDir: string;
  readonly slugs: readonly string[];
  readonly translation: {
    readonly targetLang: string;
    readonly packFormat: number;
    readonly terminology: Readonly<Record<string, string>>;
    readonly keyOverrides: Readonly<Record<string, string>>;
    readonly llm: Readonly<LlmSettings> & {
      readonly apiKey?: string;
      readonly baseUrl?: string;
    };
  };
  readonly dictionary: {
    /** Absolute path of a local dictionary file */
    readonly path?: string;
    readonly url: string;
  };
  readonly concurrency: {
    readonly units: number;
    readonly modpacks: number;
  };
  readonly curseforge: {
    readonly apiKey?: string;
  };
}

/**
 * Command-line overrides applied on top of the config file.
 */
export interface ConfigOverrides {
  /** Replace the configured slug list */
  slugs?: string[];
  /** Force LLM translation on or off */
  llmEnabled?: boolean;
  /** Replace the project root */
  rootDir?: string;
}

/**
 * Options for loadAppConfig
 */
export interface LoadConfigOptions {
  /** Config file path (default: LOCALIZATION_CONFIG or ./localization.config.json) */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  /** Base for relative paths when no config file exists (default: process.cwd()) */
  cwd?: string;
}

/**
 * Recursively freeze a value.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Format Zod issues as "path: message" lines.
 */
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Load, validate and freeze the configuration.
 *
 * Precedence: command-line overrides, then environment, then config file,
 * then schema defaults. Relative paths in the config file resolve against
 * the file's directory.
 *
 * @param options - Config file location, environment and overrides
 * @returns Frozen AppConfig
 * @throws Error listing every invalid field
 *
 * @example
 * ```typescript
 * const config = await loadAppConfig({ overrides: { llmEnabled: false } });
 * console.log(config.slugs); // ['all-the-mods-10']
 * ```
 */
export async function loadAppConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = loadEnv(options.env);
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.resolve(
    cwd,
    options.configPath ?? env.LOCALIZATION_CONFIG ?? DEFAULT_CONFIG_FILE
  );

  let raw: unknown = {};
  const hasFile = await fileExists(configPath);
  if (hasFile) {
    raw = await readJson(configPath);
  } else if (options.configPath !== undefined) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid configuration in ${configPath}: expected a JSON object`);
  }

  const input: Record<string, unknown> = { ...raw };
  if (options.overrides?.slugs && options.overrides.slugs.length > 0) {
    input.modpacks = { slugs: options.overrides.slugs };
  }

  const parsed = AppConfigFileSchema.safeParse(input);
  if (!parsed.success) {
    const source = hasFile ? configPath : 'command line';
    throw new Error(`Invalid configuration (${source}):\n${formatIssues(parsed.error)}`);
  }
  const file = parsed.data;

  const baseDir = hasFile ? path.dirname(configPath) : cwd;
  const rootDir = path.resolve(
    baseDir,
    options.overrides?.rootDir ?? env.LOCALIZATION_ROOT ?? file.paths.root
  );

  const config: AppConfig = {
    rootDir,
    slugs: [...new Set(file.modpacks.slugs)],
    translation: {
      targetLang: file.translation.targetLang,
      packFormat: file.translation.packFormat,
      terminology: file.translation.terminology,
      keyOverrides: file.translation.keyOverrides,
      llm: {
        ...file.translation.llm,
        enabled: options.overrides?.llmEnabled ?? file.translation.llm.enabled,
        model: env.OPENAI_MODEL_ID ?? file.translation.llm.model,
        apiKey: env.OPENAI_API_KEY,
        baseUrl: env.OPENAI_BASE_URL,
      },
    },
    dictionary: {
      path: file.dictionary.path !== undefined ? path.resolve(baseDir, file.dictionary.path) : undefined,
      url: file.dictionary.url,
    },
    concurrency: file.concurrency,
    curseforge: {
      apiKey: env.CURSEFORGE_API_KEY,
    },
  };

  return deepFreeze(config);
}

/**
 * Get the OpenAI API key or throw if not configured
 */
export function requireLlmApiKey(config: AppConfig): string {
  const key = config.translation.llm.apiKey;
  if (!key) {
    throw new Error(
      'Missing required API key: OPENAI_API_KEY. ' +
        'Set it in your .env file or disable LLM translation.'
    );
  }
  return key;
}

/**
 * Get the CurseForge API key or throw if not configured
 */
export function requireCurseForgeApiKey(config: AppConfig): string {
  const key = config.curseforge.apiKey;
  if (!key) {
    throw new Error(
      'Missing required API key: CURSEFORGE_API_KEY. Please set it in your .env file.'
    );
  }
  return key;
}
