/**
 * LLM Translation Prompts
 *
 * @module translation/prompts
 */

/**
 * Display names of common Minecraft locales, used in the system prompt.
 * Unknown codes are shown as-is.
 */
const LOCALE_NAMES: Record<string, string> = {
  zh_cn: 'Simplified Chinese',
  zh_tw: 'Traditional Chinese',
  zh_hk: 'Traditional Chinese (Hong Kong)',
  ja_jp: 'Japanese',
  ko_kr: 'Korean',
  ru_ru: 'Russian',
  de_de: 'German',
  fr_fr: 'French',
  es_es: 'Spanish',
  pt_br: 'Brazilian Portuguese',
};

export function describeLocale(code: string): string {
  const name = LOCALE_NAMES[code];
  return name ? `${name} (${code})` : code;
}

/**
 * Render dictionary reference lines for the system prompt.
 */
export function formatDictionaryContext(entries: ReadonlyArray<readonly [string, string]>): string {
  if (entries.length === 0) {
    return '(no matching dictionary entries)';
  }
  return entries.map(([source, target]) => `- ${source} → ${target}`).join('\n');
}

/**
 * Build the system prompt for one batch.
 */
export function buildSystemPrompt(targetLang: string, dictionaryContext: string): string {
  const language = describeLocale(targetLang);
  return `You are an expert translator of Minecraft mods and modpacks. Translate English game text into ${language}.

## Rules

1. Keep every formatting code unchanged: § color codes (§a, §l, §r) and & color codes (&a, &l).
2. Keep every placeholder unchanged: %s, %d, %1$s, %2$d, {0}, {1}.
3. Keep escape sequences such as \\n unchanged.
4. Use the community's established names for Minecraft items, blocks and entities. When unsure, keep the English.
5. Do not translate numbers, punctuation, commands starting with /, variable names, or resource ids such as minecraft:stone.
6. Prefer short, natural wording that reads like the rest of the game.

## Reference dictionary

${dictionaryContext}

## Input

A JSON object whose values are English texts.

## Output

A JSON object with exactly the same keys, whose values are the translations. Output only the JSON.`;
}

/**
 * Build the user message: a JSON object keyed by position ("1", "2", ...).
 */
export function buildUserPrompt(texts: readonly string[]): string {
  const payload: Record<string, string> = {};
  texts.forEach((text, index) => {
    payload[String(index + 1)] = text;
  });
  return JSON.stringify(payload, null, 2);
}
