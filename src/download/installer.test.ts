import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import AdmZip from 'adm-zip';
import type { ManifestFile } from '../schemas/modpack.js';
import type { FetchedModFile, Logger, ModpackSource } from '../pipeline/types.js';
import { DistributionBlockedError } from './curseforge.js';
import { installModpack, isSafeRelative, readManifest } from './installer.js';

function buildArchive(manifest: unknown, files: Record<string, string> = {}): Buffer {
  const zip = new AdmZip();
  zip.addFile('manifest.json', Buffer.from(JSON.stringify(manifest)));
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content));
  }
  return zip.toBuffer();
}

function fakeSource(fetchModFile: (file: ManifestFile) => Promise<FetchedModFile>): ModpackSource {
  return {
    fetch: () => Promise.reject(new Error('not used')),
    fetchModFile,
  };
}

function recordingLogger(warnings: string[]): Logger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: (message: string) => {
      warnings.push(message);
    },
    error: () => undefined,
  };
}

describe('readManifest', () => {
  it('applies defaults to a minimal manifest', () => {
    expect(readManifest(buildArchive({ minecraft: { version: '1.20.1' } }))).toEqual({
      minecraft: { version: '1.20.1' },
      name: '',
      version: '',
      files: [],
      overrides: 'overrides',
    });
  });

  it('reads the manifest from an already opened archive', () => {
    const zip = new AdmZip(buildArchive({ name: 'Pack A', minecraft: { version: '1.21.1' } }));

    expect(readManifest(zip).name).toBe('Pack A');
  });

  it('rejects an archive without a manifest', () => {
    const zip = new AdmZip();
    zip.addFile('overrides/a.txt', Buffer.from('a'));

    expect(() => readManifest(zip.toBuffer())).toThrow('Missing CurseForge manifest.json');
  });

  it('rejects malformed JSON', () => {
    const zip = new AdmZip();
    zip.addFile('manifest.json', Buffer.from('{nope'));

    expect(() => readManifest(zip)).toThrow('Invalid CurseForge manifest.json');
  });

  it('rejects a manifest without a Minecraft version', () => {
    expect(() => readManifest(buildArchive({ name: 'x' }))).toThrow('Invalid CurseForge manifest.json: Required');
  });
});

describe('isSafeRelative', () => {
  it.each([
    ['config/a.txt', true],
    ['', false],
    ['/etc/passwd', false],
    ['../a.txt', false],
    ['a/../../b', false],
  ])('%s is safe: %s', (rel, expected) => {
    expect(isSafeRelative(rel)).toBe(expected);
  });
});

describe('installModpack', () => {
  let instanceDir: string;

  beforeEach(async () => {
    instanceDir = await fs.mkdtemp(path.join(os.tmpdir(), 'install-test-'));
  });

  afterEach(async () => {
    await fs.rm(instanceDir, { recursive: true, force: true });
  });

  it('unpacks overrides and downloads every mod', async () => {
    const archive = buildArchive(
      {
        minecraft: { version: '1.20.1' },
        files: [
          { projectID: 1, fileID: 10 },
          { projectID: 2, fileID: 20 },
        ],
      },
      {
        'overrides/config/ftbquests/quests/lang/en_us.snbt': '{a: "A"}',
        'overrides/kubejs/assets/kubejs/lang/en_us.json': '{}',
        'README.md': 'outside overrides',
      }
    );
    const source = fakeSource((file) =>
      Promise.resolve({ fileName: `mod-${file.projectID}.jar`, data: Buffer.from(`jar ${file.fileID}`) })
    );

    const result = await installModpack(archive, instanceDir, { source, logger: recordingLogger([]) });

    expect(result).toEqual({ overrideFiles: 2, modFiles: 2, blocked: [] });
    expect((await fs.readdir(path.join(instanceDir, 'mods'))).sort()).toEqual(['mod-1.jar', 'mod-2.jar']);
    expect(await fs.readFile(path.join(instanceDir, 'mods', 'mod-2.jar'), 'utf-8')).toBe('jar 20');
    expect(
      await fs.readFile(path.join(instanceDir, 'config', 'ftbquests', 'quests', 'lang', 'en_us.snbt'), 'utf-8')
    ).toBe('{a: "A"}');
    await expect(fs.access(path.join(instanceDir, 'README.md'))).rejects.toThrow();
  });

  it('tolerates blocked and optional mods', async () => {
    const archive = buildArchive({
      minecraft: { version: '1.20.1' },
      files: [
        { projectID: 1, fileID: 10 },
        { projectID: 3, fileID: 30 },
        { projectID: 4, fileID: 40, required: false },
      ],
    });
    const source = fakeSource((file) => {
      if (file.projectID === 3) return Promise.reject(new DistributionBlockedError('blocked-mod.jar'));
      if (file.projectID === 4) return Promise.reject(new Error('boom'));
      return Promise.resolve({ fileName: 'ok.jar', data: Buffer.from('ok') });
    });
    const warnings: string[] = [];

    const result = await installModpack(archive, instanceDir, { source, logger: recordingLogger(warnings) });

    expect(result).toEqual({ overrideFiles: 0, modFiles: 1, blocked: ['blocked-mod.jar'] });
    expect(warnings).toEqual([
      'Third-party download disabled for blocked-mod.jar; lang files of this mod will be missing',
      'Optional mod 4/40 failed: boom',
    ]);
  });

  it('fails when a required mod cannot be downloaded', async () => {
    const archive = buildArchive({
      minecraft: { version: '1.20.1' },
      files: [{ projectID: 5, fileID: 50 }],
    });
    const source = fakeSource(() => Promise.reject(new Error('connection reset')));

    await expect(
      installModpack(archive, instanceDir, { source, logger: recordingLogger([]) })
    ).rejects.toThrow('1 mod download(s) failed: 5/50: connection reset');
  });
});
