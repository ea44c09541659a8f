/**
 * Modpack Localizer
 *
 * Public API: configuration, the pipeline driver, stage executors and the
 * built-in collaborators.
 *
 * @module modpack-localizer
 */

export { loadAppConfig, type AppConfig, type ConfigOverrides, type LoadConfigOptions } from './config/index.js';
export { createCollaborators, createExecutor, createTranslator, LazyCurseForgeSource } from './app.js';
export * from './pipeline/index.js';
export { DEFAULT_STAGES, downloadStage, extractStage, translateStage, packageStage } from './stages/index.js';
export { ArtifactStore } from './storage/artifact-store.js';
export { CurseForgeClient, installModpack } from './download/index.js';
export { createDefaultExtractors, ModJarExtractor, KubeJsExtractor, FtbQuestsExtractor } from './extractors/index.js';
export { Dictionary, loadDictionary, LlmTranslator, translateEntries } from './translation/index.js';
export { ArchivePackager, createZipBuffer } from './export/index.js';
export type { UnitKey, UnitCategory, EntrySet } from './schemas/unit.js';
