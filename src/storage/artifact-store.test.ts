import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ArtifactStore, hashEntrySet, type StoredTranslation } from './artifact-store.js';
import { getArchivePath, getUnitDir } from './paths.js';
import type { ModpackInfo } from '../schemas/modpack.js';

const SLUG = 'pack-a';

function translation(entries: Record<string, string>, sourceHash: string): StoredTranslation {
  return {
    entries,
    record: {
      schemaVersion: 1,
      category: 'mod',
      name: 'create',
      sourceHash,
      createdAt: '2026-01-01T00:00:00.000Z',
      counts: { total: Object.keys(entries).length, dictionary: 0, llm: 0, passthrough: Object.keys(entries).length },
      untranslatedKeys: [],
    },
  };
}

describe('ArtifactStore', () => {
  let root: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'artifact-store-'));
    store = new ArtifactStore(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('hashEntrySet', () => {
    it('is a 64-character hex digest', () => {
      expect(hashEntrySet({ a: 'b' })).toMatch(/^[a-f0-9]{64}$/);
    });

    it('depends on key order and values', () => {
      const base = hashEntrySet({ a: '1', b: '2' });
      expect(hashEntrySet({ a: '1', b: '2' })).toBe(base);
      expect(hashEntrySet({ b: '2', a: '1' })).not.toBe(base);
      expect(hashEntrySet({ a: '1', b: '3' })).not.toBe(base);
    });
  });

  describe('extracted categories', () => {
    it('writes mod units one directory each', async () => {
      await store.writeCategory(
        SLUG,
        'mod',
        new Map<string, Record<string, string>>([
          ['create', { 'item.create.cog': 'Cog' }],
          ['botania', {}],
        ])
      );

      expect(await store.categoryExists(SLUG, 'extracted', 'mod')).toBe(true);
      expect((await store.listUnitNames(SLUG, 'extracted', 'mod')).sort()).toEqual(['botania', 'create']);
      expect(await store.read(SLUG, 'extracted', { category: 'mod', name: 'create' })).toEqual({
        'item.create.cog': 'Cog',
      });
      expect(await store.read(SLUG, 'extracted', { category: 'mod', name: 'botania' })).toEqual({});
    });

    it('records an empty category as extracted with no units', async () => {
      await store.writeCategory(SLUG, 'kubejs', new Map());

      expect(await store.categoryExists(SLUG, 'extracted', 'kubejs')).toBe(true);
      expect(await store.listUnitNames(SLUG, 'extracted', 'kubejs')).toEqual([]);
    });

    it('stores singleton units in the category directory', async () => {
      await store.writeCategory(SLUG, 'ftbquests', new Map<string, Record<string, string>>([['ftbquests', { 'quest.a': 'A' }]]));

      expect(await store.listUnitNames(SLUG, 'extracted', 'ftbquests')).toEqual(['ftbquests']);
      expect(await store.exists(SLUG, 'extracted', { category: 'ftbquests', name: 'ftbquests' })).toBe(true);
    });

    it('ignores hidden staging directories when listing', async () => {
      await store.writeCategory(SLUG, 'mod', new Map<string, Record<string, string>>([['create', {}]]));
      const modsDir = path.dirname(getUnitDir(root, SLUG, 'extracted', { category: 'mod', name: 'create' }));
      await fs.mkdir(path.join(modsDir, '.create.staging.1'));

      expect(await store.listUnitNames(SLUG, 'extracted', 'mod')).toEqual(['create']);
    });

    it('lists nothing for a category never extracted', async () => {
      expect(await store.listUnitNames(SLUG, 'extracted', 'mod')).toEqual([]);
      expect(await store.categoryExists(SLUG, 'extracted', 'mod')).toBe(false);
    });

    it('reports recorded mod units whose leaf was deleted', async () => {
      await store.writeCategory(
        SLUG,
        'mod',
        new Map<string, Record<string, string>>([
          ['create', { a: 'A' }],
          ['botania', {}],
        ])
      );
      expect(await store.listMissingUnits(SLUG, 'mod')).toEqual([]);

      await store.remove(SLUG, 'extracted', { category: 'mod', name: 'create' });

      expect(await store.listMissingUnits(SLUG, 'mod')).toEqual(['create']);
      expect(await store.listUnitNames(SLUG, 'extracted', 'mod')).toEqual(['botania']);

      await store.writeExtractedUnit(SLUG, 'create', { a: 'A' });

      expect(await store.listMissingUnits(SLUG, 'mod')).toEqual([]);
      expect(await store.read(SLUG, 'extracted', { category: 'mod', name: 'create' })).toEqual({ a: 'A' });
    });

    it('never reports missing units for singleton categories', async () => {
      await store.writeCategory(SLUG, 'kubejs', new Map<string, Record<string, string>>([['kubejs', { k: 'K' }]]));

      expect(await store.listMissingUnits(SLUG, 'kubejs')).toEqual([]);
    });

    it('removes a whole category', async () => {
      await store.writeCategory(SLUG, 'mod', new Map<string, Record<string, string>>([['create', {}]]));

      expect(await store.removeCategory(SLUG, 'extracted', 'mod')).toBe(true);
      expect(await store.categoryExists(SLUG, 'extracted', 'mod')).toBe(false);
      expect(await store.removeCategory(SLUG, 'extracted', 'mod')).toBe(false);
    });
  });

  describe('translated units', () => {
    const unit = { category: 'mod' as const, name: 'create' };

    it('reports absence until written', async () => {
      expect(await store.exists(SLUG, 'translated', unit)).toBe(false);
      expect(await store.read(SLUG, 'translated', unit)).toBeNull();
      expect(await store.readTranslation(SLUG, unit)).toBeNull();
    });

    it('round-trips entries and record', async () => {
      const data = translation({ 'item.create.cog': '齿轮' }, hashEntrySet({ 'item.create.cog': 'Cog' }));
      await store.write(SLUG, 'translated', unit, data);

      expect(await store.exists(SLUG, 'translated', unit)).toBe(true);
      expect(await store.readTranslation(SLUG, unit)).toEqual(data);
    });

    it('keeps the source entries a translation was made from', async () => {
      const data = { ...translation({ a: '甲' }, hashEntrySet({ a: 'A' })), source: { a: 'A' } };
      await store.write(SLUG, 'translated', unit, data);

      expect((await store.readTranslation(SLUG, unit))?.source).toEqual({ a: 'A' });
    });

    it('treats deleting the leaf directory as invalidation', async () => {
      await store.write(SLUG, 'translated', unit, translation({}, hashEntrySet({})));

      expect(await store.remove(SLUG, 'translated', unit)).toBe(true);
      expect(await store.exists(SLUG, 'translated', unit)).toBe(false);
      expect(await store.remove(SLUG, 'translated', unit)).toBe(false);
    });

    it('rejects malformed entries', async () => {
      const unitDir = getUnitDir(root, SLUG, 'translated', unit);
      await fs.mkdir(unitDir, { recursive: true });
      await fs.writeFile(path.join(unitDir, 'entries.json'), '{"a": 1}');

      await expect(store.read(SLUG, 'translated', unit)).rejects.toThrow();
    });
  });

  describe('download', () => {
    const info: ModpackInfo = {
      schemaVersion: 1,
      slug: SLUG,
      name: 'Pack A',
      version: '1.0.0',
      projectId: 1,
      fileId: 2,
      fileName: 'pack-a-1.0.0.zip',
      mcVersion: '1.20.1',
      downloadedAt: '2026-01-01T00:00:00.000Z',
    };

    it('is present only after archive and instance are written', async () => {
      expect(await store.downloadExists(SLUG)).toBe(false);
      expect(await store.readModpackInfo(SLUG)).toBeNull();

      await store.writeDownload(SLUG, { archive: Buffer.from('zip'), info }, async (instanceDir) => {
        await fs.mkdir(path.join(instanceDir, 'mods'));
      });

      expect(await store.downloadExists(SLUG)).toBe(true);
      expect(await store.readModpackInfo(SLUG)).toEqual(info);
      expect(await fs.readFile(getArchivePath(root, SLUG), 'utf-8')).toBe('zip');
      expect(await fs.readdir(store.instanceDir(SLUG))).toEqual(['mods']);
    });

    it('writes nothing when installation fails', async () => {
      await expect(
        store.writeDownload(SLUG, { archive: Buffer.from('zip'), info }, async () => {
          throw new Error('mod file missing');
        })
      ).rejects.toThrow('mod file missing');

      expect(await store.downloadExists(SLUG)).toBe(false);
      expect(await store.readModpackInfo(SLUG)).toBeNull();
    });
  });
});
