/**
 * Built-in extractors, one per unit category.
 *
 * @module extractors
 */

import type { Extractor } from '../pipeline/types.js';
import { FtbQuestsExtractor } from './ftbquests.js';
import { KubeJsExtractor } from './kubejs.js';
import { ModJarExtractor } from './mods.js';

export { ModJarExtractor, readJarLangFiles } from './mods.js';
export { KubeJsExtractor } from './kubejs.js';
export { FtbQuestsExtractor, QUEST_LANG_DIR, QUEST_ROOTS } from './ftbquests.js';
export { parseLangJson, listFiles } from './lang-file.js';
export {
  parseSnbtLang,
  stringifySnbtLang,
  flattenSnbtLang,
  toSnbtLang,
  SnbtSyntaxError,
  type SnbtLang,
  type SnbtLangValue,
} from './snbt.js';

export function createDefaultExtractors(): Extractor[] {
  return [new ModJarExtractor(), new KubeJsExtractor(), new FtbQuestsExtractor()];
}
