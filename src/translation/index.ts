/**
 * Translation: dictionary lookup, LLM batches, and per-unit resolution.
 *
 * @module translation
 */

export {
  Dictionary,
  DictMiniSchema,
  MAX_CONTEXT_ENTRIES,
  loadDictionary,
  loadDictMini,
  parseDictMini,
  type DictMini,
  type DictionaryLayers,
  type LoadDictionaryOptions,
} from './dictionary.js';

export {
  LlmTranslator,
  LlmApiError,
  createOpenAiCompletion,
  extractJsonObject,
  mapResponse,
  toLlmApiError,
  calculateDelay,
  type ChatCompletionFn,
  type ChatMessage,
  type ChatRequest,
  type ContextProvider,
  type LlmClientOptions,
} from './llm-client.js';

export { buildSystemPrompt, buildUserPrompt, formatDictionaryContext, describeLocale } from './prompts.js';

export {
  translateEntries,
  toBatches,
  type PreviousTranslation,
  type TranslateEntriesOptions,
  type TranslationCounts,
  type TranslationOutcome,
} from './translate.js';
