import { describe, it, expect, jest } from '@jest/globals';
import { toBatches, translateEntries } from './translate.js';
import { Dictionary } from './dictionary.js';
import type { BatchTranslator } from '../pipeline/types.js';

type TranslateBatch = BatchTranslator['translateBatch'];

/**
 * Translator that upper-cases and tags each text, recording each batch.
 */
function fakeTranslator(): { translator: BatchTranslator; batches: string[][] } {
  const batches: string[][] = [];
  const translateBatch = jest.fn<TranslateBatch>(async (texts) => {
    batches.push([...texts]);
    return texts.map((text) => `[zh] ${text}`);
  });
  return { translator: { translateBatch }, batches };
}

const options = { batchSize: 50, timeoutMs: 1000 };

describe('toBatches', () => {
  it('splits into consecutive batches', () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(toBatches([], 3)).toEqual([]);
  });
});

describe('translateEntries', () => {
  it('passes misses through and flags them when no translator is given', async () => {
    const outcome = await translateEntries(
      { key1: 'Hello', key2: 'World' },
      { ...options, dictionary: new Dictionary({ dictMini: { Hello: ['你好'] } }) }
    );

    expect(outcome.entries).toEqual({ key1: '你好', key2: 'World' });
    expect(outcome.untranslatedKeys).toEqual(['key2']);
    expect(outcome.counts).toEqual({ total: 2, dictionary: 1, llm: 0, passthrough: 1 });
  });

  it('sends only dictionary misses to the translator, once per distinct text', async () => {
    const { translator, batches } = fakeTranslator();

    const outcome = await translateEntries(
      { a: 'Hello', b: 'Copper', c: 'Tin', d: 'Copper' },
      { ...options, dictionary: new Dictionary({ terminology: { Hello: '你好' } }), translator }
    );

    expect(batches).toEqual([['Copper', 'Tin']]);
    expect(outcome.entries).toEqual({ a: '你好', b: '[zh] Copper', c: '[zh] Tin', d: '[zh] Copper' });
    expect(outcome.untranslatedKeys).toEqual([]);
    expect(outcome.counts).toEqual({ total: 4, dictionary: 1, llm: 3, passthrough: 0 });
  });

  it('batches by batchSize', async () => {
    const { translator, batches } = fakeTranslator();

    await translateEntries(
      { a: 'A1', b: 'B1', c: 'C1' },
      { ...options, batchSize: 2, dictionary: new Dictionary(), translator }
    );

    expect(batches).toEqual([['A1', 'B1'], ['C1']]);
  });

  it('flags texts the model left out', async () => {
    const translator: BatchTranslator = {
      translateBatch: async (texts) => texts.map((text) => (text === 'Tin' ? null : `[zh] ${text}`)),
    };

    const outcome = await translateEntries(
      { a: 'Copper', b: 'Tin' },
      { ...options, dictionary: new Dictionary(), translator }
    );

    expect(outcome.entries).toEqual({ a: '[zh] Copper', b: 'Tin' });
    expect(outcome.untranslatedKeys).toEqual(['b']);
  });

  it('passes blank values through without flagging them', async () => {
    const { translator, batches } = fakeTranslator();

    const outcome = await translateEntries(
      { a: '', b: '  ' },
      { ...options, dictionary: new Dictionary(), translator }
    );

    expect(batches).toEqual([]);
    expect(outcome.entries).toEqual({ a: '', b: '  ' });
    expect(outcome.untranslatedKeys).toEqual([]);
    expect(outcome.counts.passthrough).toBe(2);
  });

  it('keeps the input key order', async () => {
    const outcome = await translateEntries(
      { z: 'Hello', a: 'Other', m: 'Hello' },
      { ...options, dictionary: new Dictionary({ terminology: { Hello: '你好' } }) }
    );

    expect(Object.keys(outcome.entries)).toEqual(['z', 'a', 'm']);
  });

  it('propagates translator failures', async () => {
    const translator: BatchTranslator = {
      translateBatch: async () => {
        throw new Error('retries exhausted');
      },
    };

    await expect(
      translateEntries({ a: 'Copper' }, { ...options, dictionary: new Dictionary(), translator })
    ).rejects.toThrow('retries exhausted');
  });

  it('handles an empty entry set', async () => {
    const outcome = await translateEntries({}, { ...options, dictionary: new Dictionary() });

    expect(outcome).toEqual({
      entries: {},
      untranslatedKeys: [],
      counts: { total: 0, dictionary: 0, llm: 0, passthrough: 0 },
      reused: 0,
    });
  });

  describe('with a previous translation', () => {
    const previous = {
      source: { a: 'Copper', b: 'Tin', c: 'Iron', d: 'Lead' },
      entries: { a: '铜', b: '锡', c: 'Iron', d: '铅' },
      untranslatedKeys: ['c'],
    };

    it('reuses values whose source text is unchanged and sends the rest to the translator', async () => {
      const { translator, batches } = fakeTranslator();

      const outcome = await translateEntries(
        { a: 'Copper', b: 'Tin ingot', c: 'Iron', e: 'Gold' },
        { ...options, dictionary: new Dictionary(), translator, previous }
      );

      expect(batches).toEqual([['Tin ingot', 'Iron', 'Gold']]);
      expect(outcome.entries).toEqual({ a: '铜', b: '[zh] Tin ingot', c: '[zh] Iron', e: '[zh] Gold' });
      expect(outcome.reused).toBe(1);
      expect(outcome.counts).toEqual({ total: 4, dictionary: 0, llm: 4, passthrough: 0 });
    });

    it('lets a dictionary hit win over the previous value', async () => {
      const outcome = await translateEntries(
        { a: 'Copper' },
        { ...options, dictionary: new Dictionary({ terminology: { Copper: '紫铜' } }), previous }
      );

      expect(outcome.entries).toEqual({ a: '紫铜' });
      expect(outcome.reused).toBe(0);
    });

    it('reuses values without a translator', async () => {
      const outcome = await translateEntries(
        { a: 'Copper', d: 'Lead', f: 'Zinc' },
        { ...options, dictionary: new Dictionary(), previous }
      );

      expect(outcome.entries).toEqual({ a: '铜', d: '铅', f: 'Zinc' });
      expect(outcome.untranslatedKeys).toEqual(['f']);
    });
  });
});
