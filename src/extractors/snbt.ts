/**
 * SNBT Lang File Codec
 *
 * Reads and writes the subset of SNBT used by FTB Quests lang files: one
 * compound of keys mapped to strings or lists of strings.
 *
 * ```
 * {
 * 	chapter.4A1B.title: "Getting Started"
 * 	quest.77C2.quest_desc: [
 * 		"First line"
 * 		""
 * 	]
 * }
 * ```
 *
 * List values are flattened to `key[0]`, `key[1]`, ... so that every entry
 * is a single translatable string; {@link toSnbtLang} folds them back.
 *
 * @module extractors/snbt
 */

import type { EntrySet } from '../schemas/unit.js';

export type SnbtLangValue = string | string[];

export type SnbtLang = Map<string, SnbtLangValue>;

/**
 * Parse failure with a 1-based line number.
 */
export class SnbtSyntaxError extends Error {
  constructor(message: string, public readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = 'SnbtSyntaxError';
  }
}

const BARE_KEY = /^[A-Za-z0-9._+-]+$/;
const BARE_CHAR = /[A-Za-z0-9._+-]/;

// ============================================================================
// Parser
// ============================================================================

class Parser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): SnbtLang {
    this.skipSpace();
    const result = this.parseCompound();
    this.skipSpace();
    if (this.pos < this.text.length) {
      this.fail(`Unexpected trailing content '${this.text[this.pos]}'`);
    }
    return result;
  }

  private parseCompound(): SnbtLang {
    this.expect('{');
    const result: SnbtLang = new Map();

    this.skipSeparators();
    while (this.peek() !== '}') {
      if (this.pos >= this.text.length) {
        this.fail('Unterminated compound');
      }
      const key = this.parseKey();
      this.skipSpace();
      this.expect(':');
      this.skipSpace();
      result.set(key, this.parseValue(key));
      this.skipSeparators();
    }
    this.pos++;

    return result;
  }

  private parseKey(): string {
    const ch = this.peek();
    if (ch === '"' || ch === "'") {
      return this.parseString();
    }
    const start = this.pos;
    while (this.pos < this.text.length && BARE_CHAR.test(this.text[this.pos])) {
      this.pos++;
    }
    if (this.pos === start) {
      this.fail(`Expected key, found '${ch ?? 'end of input'}'`);
    }
    return this.text.slice(start, this.pos);
  }

  private parseValue(key: string): SnbtLangValue {
    const ch = this.peek();
    if (ch === '"' || ch === "'") {
      return this.parseString();
    }
    if (ch === '[') {
      return this.parseList(key);
    }
    return this.fail(`Value of '${key}' must be a string or a list of strings`);
  }

  private parseList(key: string): string[] {
    this.expect('[');
    const items: string[] = [];

    this.skipSeparators();
    while (this.peek() !== ']') {
      if (this.pos >= this.text.length) {
        this.fail(`Unterminated list for '${key}'`);
      }
      const ch = this.peek();
      if (ch !== '"' && ch !== "'") {
        this.fail(`List '${key}' must contain only strings`);
      }
      items.push(this.parseString());
      this.skipSeparators();
    }
    this.pos++;

    return items;
  }

  private parseString(): string {
    const quote = this.text[this.pos];
    this.pos++;
    let out = '';

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === '\\') {
        const next = this.text[this.pos + 1];
        switch (next) {
          case 'n':
            out += '\n';
            break;
          case 't':
            out += '\t';
            break;
          case 'r':
            out += '\r';
            break;
          case undefined:
            return this.fail('Unterminated escape');
          default:
            out += next;
        }
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }

    return this.fail('Unterminated string');
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private skipSeparators(): void {
    while (this.pos < this.text.length && /[\s,]/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      this.fail(`Expected '${ch}', found '${this.text[this.pos] ?? 'end of input'}'`);
    }
    this.pos++;
  }

  private fail(message: string): never {
    const line = this.text.slice(0, this.pos).split('\n').length;
    throw new SnbtSyntaxError(message, line);
  }
}

/**
 * Parse an SNBT lang compound.
 *
 * @throws SnbtSyntaxError on malformed input or non-string values
 */
export function parseSnbtLang(text: string): SnbtLang {
  return new Parser(text).parse();
}

// ============================================================================
// Writer
// ============================================================================

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

function formatKey(key: string): string {
  return BARE_KEY.test(key) ? key : quote(key);
}

/**
 * Serialize an SNBT lang compound with tab indentation and a trailing
 * newline.
 */
export function stringifySnbtLang(lang: SnbtLang): string {
  const lines = ['{'];
  for (const [key, value] of lang) {
    if (typeof value === 'string') {
      lines.push(`\t${formatKey(key)}: ${quote(value)}`);
    } else {
      lines.push(`\t${formatKey(key)}: [`);
      for (const item of value) {
        lines.push(`\t\t${quote(item)}`);
      }
      lines.push('\t]');
    }
  }
  lines.push('}');
  return lines.join('\n') + '\n';
}

// ============================================================================
// Flattening
// ============================================================================

const LIST_ITEM_KEY = /^(.*)\[(\d+)\]$/;
const EMPTY_LIST_KEY = /^(.*)\[\]$/;

/**
 * Flatten lists to `key[i]` entries, preserving order. An empty list
 * becomes a single blank `key[]` entry.
 */
export function flattenSnbtLang(lang: SnbtLang): EntrySet {
  const entries: EntrySet = {};
  for (const [key, value] of lang) {
    if (typeof value === 'string') {
      entries[key] = value;
    } else if (value.length === 0) {
      entries[`${key}[]`] = '';
    } else {
      value.forEach((item, index) => {
        entries[`${key}[${index}]`] = item;
      });
    }
  }
  return entries;
}

/**
 * Fold `key[i]` entries back into lists. A list takes the position of its
 * first item; items are ordered by index.
 */
export function toSnbtLang(entries: EntrySet): SnbtLang {
  const lang: SnbtLang = new Map();
  const lists = new Map<string, Array<[number, string]>>();

  for (const [key, value] of Object.entries(entries)) {
    const empty = EMPTY_LIST_KEY.exec(key);
    if (empty) {
      lang.set(empty[1], []);
      continue;
    }
    const match = LIST_ITEM_KEY.exec(key);
    if (!match) {
      lang.set(key, value);
      continue;
    }
    const [, base, index] = match;
    let items = lists.get(base);
    if (!items) {
      items = [];
      lists.set(base, items);
      lang.set(base, []);
    }
    items.push([Number(index), value]);
  }

  for (const [base, items] of lists) {
    lang.set(
      base,
      items.sort((a, b) => a[0] - b[0]).map(([, value]) => value)
    );
  }

  return lang;
}
