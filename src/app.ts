/**
 * Composition Root
 *
 * Builds the collaborators and the executor a run needs from one AppConfig.
 *
 * @module app
 */

import { requireCurseForgeApiKey, requireLlmApiKey, type AppConfig } from './config/index.js';
import { CurseForgeClient } from './download/curseforge.js';
import { ArchivePackager } from './export/packager.js';
import { createDefaultExtractors } from './extractors/index.js';
import { PipelineExecutor } from './pipeline/executor.js';
import type {
  BatchTranslator,
  Collaborators,
  FetchedModFile,
  FetchedModpack,
  Logger,
  ModpackSource,
} from './pipeline/types.js';
import type { ManifestFile } from './schemas/modpack.js';
import { DEFAULT_STAGES } from './stages/index.js';
import { ArtifactStore } from './storage/artifact-store.js';
import { loadDictionary, type Dictionary, type FetchLike } from './translation/dictionary.js';
import { LlmTranslator, createOpenAiCompletion } from './translation/llm-client.js';

/**
 * Download client that only asks for the CurseForge key once a modpack
 * actually has to be fetched. Already-downloaded modpacks run without one.
 */
export class LazyCurseForgeSource implements ModpackSource {
  private client: CurseForgeClient | undefined;

  constructor(private readonly config: AppConfig) {}

  fetch(slug: string, signal?: AbortSignal): Promise<FetchedModpack> {
    return this.getClient().fetch(slug, signal);
  }

  fetchModFile(file: ManifestFile, signal?: AbortSignal): Promise<FetchedModFile> {
    return this.getClient().fetchModFile(file, signal);
  }

  private getClient(): CurseForgeClient {
    if (!this.client) {
      this.client = new CurseForgeClient({ apiKey: requireCurseForgeApiKey(this.config) });
    }
    return this.client;
  }
}

/**
 * LLM client for dictionary misses, or undefined when LLM translation is off.
 *
 * @throws Error if LLM translation is on and OPENAI_API_KEY is missing
 */
export function createTranslator(
  config: AppConfig,
  dictionary: Dictionary,
  logger: Logger
): BatchTranslator | undefined {
  const { llm } = config.translation;
  if (!llm.enabled) {
    return undefined;
  }
  return new LlmTranslator({
    model: llm.model,
    temperature: llm.temperature,
    maxRetries: llm.maxRetries,
    targetLang: config.translation.targetLang,
    complete: createOpenAiCompletion({ apiKey: requireLlmApiKey(config), baseUrl: llm.baseUrl }),
    context: dictionary,
    logger,
  });
}

export interface CreateCollaboratorsOptions {
  logger: Logger;
  /** Used for the dictionary download */
  fetch?: FetchLike;
  signal?: AbortSignal;
}

/**
 * Wire the production collaborators.
 */
export async function createCollaborators(
  config: AppConfig,
  options: CreateCollaboratorsOptions
): Promise<Collaborators> {
  const dictionary = await loadDictionary(config, options);
  options.logger.debug(`Dictionary loaded: ${dictionary.size} entries`);

  return {
    source: new LazyCurseForgeSource(config),
    extractors: createDefaultExtractors(),
    dictionary,
    translator: createTranslator(config, dictionary, options.logger),
    packager: new ArchivePackager({
      targetLang: config.translation.targetLang,
      packFormat: config.translation.packFormat,
      description: `Modpack localization (${config.translation.targetLang})`,
    }),
  };
}

/**
 * Executor with the four default stages registered.
 */
export function createExecutor(
  config: AppConfig,
  collaborators: Collaborators,
  logger: Logger
): PipelineExecutor {
  const executor = new PipelineExecutor({
    config,
    store: new ArtifactStore(config.rootDir),
    collaborators,
    logger,
  });
  executor.registerStages(DEFAULT_STAGES);
  return executor;
}
