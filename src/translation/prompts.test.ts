import { describe, it, expect } from '@jest/globals';
import { buildSystemPrompt, buildUserPrompt, describeLocale, formatDictionaryContext } from './prompts.js';

describe('prompts', () => {
  it('names known locales and shows unknown codes as-is', () => {
    expect(describeLocale('ja_jp')).toBe('Japanese (ja_jp)');
    expect(describeLocale('tok_tok')).toBe('tok_tok');
  });

  it('renders dictionary context lines', () => {
    expect(formatDictionaryContext([])).toBe('(no matching dictionary entries)');
    expect(formatDictionaryContext([['Copper', '铜'], ['Tin', '锡']])).toBe('- Copper → 铜\n- Tin → 锡');
  });

  it('keys the user prompt by position', () => {
    expect(buildUserPrompt(['Copper', 'Tin'])).toBe('{\n  "1": "Copper",\n  "2": "Tin"\n}');
  });

  it('embeds target language and dictionary in the system prompt', () => {
    const prompt = buildSystemPrompt('zh_cn', '- Copper → 铜');
    expect(prompt).toContain('Translate English game text into Simplified Chinese (zh_cn).');
    expect(prompt).toContain('## Reference dictionary\n\n- Copper → 铜\n');
  });
});
