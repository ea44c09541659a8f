import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import AdmZip from 'adm-zip';
import { ModJarExtractor, readJarLangFiles } from './mods.js';
import { silentLogger, type Logger } from '../pipeline/types.js';

function buildJar(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  return zip.toBuffer();
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return { ...silentLogger, warn: (message: string) => warnings.push(message), warnings };
}

describe('readJarLangFiles', () => {
  it('reads en_us.json of every namespace and nothing else', () => {
    const jar = new AdmZip(
      buildJar({
        'assets/create/lang/en_us.json': '{"item.create.cog": "Cog"}',
        'assets/create/lang/zh_cn.json': '{"item.create.cog": "齿轮"}',
        'assets/ponder/lang/en_us.json': '{"ponder.title": "Ponder", "ponder.count": 3}',
        'data/create/lang/en_us.json': '{"x": "y"}',
      })
    );

    const found = readJarLangFiles(jar, 'create.jar', silentLogger);

    expect([...found]).toEqual([
      ['create', { 'item.create.cog': 'Cog' }],
      ['ponder', { 'ponder.title': 'Ponder' }],
    ]);
  });

  it('skips a malformed lang file with a warning', () => {
    const logger = recordingLogger();
    const jar = new AdmZip(buildJar({ 'assets/broken/lang/en_us.json': '{oops' }));

    expect(readJarLangFiles(jar, 'broken.jar', logger).size).toBe(0);
    expect(logger.warnings).toEqual([
      'Skipping unreadable lang file: Invalid JSON in lang file: broken.jar!/assets/broken/lang/en_us.json',
    ]);
  });
});

describe('ModJarExtractor', () => {
  let instanceDir: string;

  beforeEach(async () => {
    instanceDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mods-test-'));
  });

  afterEach(async () => {
    await fs.rm(instanceDir, { recursive: true, force: true });
  });

  async function addJar(name: string, content: Buffer): Promise<void> {
    await fs.mkdir(path.join(instanceDir, 'mods'), { recursive: true });
    await fs.writeFile(path.join(instanceDir, 'mods', name), content);
  }

  it('produces one unit per namespace, including empty ones', async () => {
    await addJar('create-0.5.jar', buildJar({ 'assets/create/lang/en_us.json': '{"a": "A"}' }));
    await addJar('empty-1.0.jar', buildJar({ 'assets/empty/lang/en_us.json': '{}' }));
    await addJar('README.txt', Buffer.from('not a jar'));

    const units = await new ModJarExtractor().extract(instanceDir, silentLogger);

    expect([...units]).toEqual([
      ['create', { a: 'A' }],
      ['empty', {}],
    ]);
  });

  it('merges a namespace shipped by several jars in jar-name order', async () => {
    await addJar('b-addon.jar', buildJar({ 'assets/shared/lang/en_us.json': '{"k": "from b", "b": "B"}' }));
    await addJar('a-core.jar', buildJar({ 'assets/shared/lang/en_us.json': '{"k": "from a", "a": "A"}' }));

    const units = await new ModJarExtractor().extract(instanceDir, silentLogger);

    expect(units.get('shared')).toEqual({ k: 'from b', a: 'A', b: 'B' });
  });

  it('skips an unreadable jar and keeps going', async () => {
    const logger = recordingLogger();
    await addJar('a-broken.jar', Buffer.from('definitely not a zip'));
    await addJar('b-good.jar', buildJar({ 'assets/good/lang/en_us.json': '{"g": "G"}' }));

    const units = await new ModJarExtractor().extract(instanceDir, logger);

    expect([...units.keys()]).toEqual(['good']);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^Skipping unreadable jar a-broken\.jar: /);
  });

  it('returns no units when there is no mods directory', async () => {
    const warn = jest.fn();

    const units = await new ModJarExtractor().extract(instanceDir, { ...silentLogger, warn });

    expect(units.size).toBe(0);
    expect(warn).toHaveBeenCalledWith(`No mods/ directory found at ${path.join(instanceDir, 'mods')}`);
  });
});
