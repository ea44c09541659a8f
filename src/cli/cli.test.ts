/**
 * CLI Smoke Tests
 *
 * Program wiring, BaseCommand output, the formatters, and the artifact
 * operations behind the status and clean commands.
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, getBaseCommand, toGlobalOptions } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import {
  formatDuration,
  formatErrorSummary,
  formatLedgerSummary,
  formatModpackStatusLine,
  formatModpackSummary,
  formatTimingBreakdown,
} from './formatters/run-summary.js';
import { formatStatusTable } from './formatters/status-table.js';
import { getCommandHelp } from './commands/index.js';
import { cleanArtifacts } from './commands/clean.js';
import { checkModpackUpdate, inspectModpack, type ModpackStatus, type UpdateChecker } from './commands/status.js';
import type { ModpackResult } from '../pipeline/executor.js';
import type { StageFailure } from '../pipeline/types.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { ArtifactStore, hashEntrySet } from '../storage/artifact-store.js';
import { fileExists } from '../storage/atomic.js';
import { ENTRIES_FILE, UNIT_RECORD_FILE, getPackagePath, getUnitDir } from '../storage/paths.js';
import { loadLedger } from '../storage/state.js';

beforeAll(() => {
  chalk.level = 0;
});

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('modpack-localizer');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual(['--version', '--verbose', '--quiet', '--no-color', '--config', '--root']);
  });

  it('should register the run, status and clean commands', () => {
    const commandNames = createProgram().commands.map((c) => c.name());

    expect(commandNames).toEqual(['run', 'status', 'clean']);
  });

  it('should give the run command its flags', () => {
    const run = createProgram().commands.find((c) => c.name() === 'run');

    expect(run?.options.map((o) => o.long)).toEqual(['--slug', '--llm', '--no-llm', '--timing']);
  });

  it('should list every registered command in the help table', () => {
    expect(getCommandHelp().map((entry) => entry.name)).toEqual(['run', 'status [slugs...]', 'clean <slug>']);
  });
});

// ============================================================================
// Version Tests
// ============================================================================

describe('Version', () => {
  it('should return formatted version info', () => {
    expect(getVersionInfo()).toBe(`Modpack Localizer v${VERSION}`);
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: {
    log: jest.SpiedFunction<typeof console.log>;
    warn: jest.SpiedFunction<typeof console.warn>;
    error: jest.SpiedFunction<typeof console.error>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(() => {}),
      warn: jest.spyOn(console, 'warn').mockImplementation(() => {}),
      error: jest.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
  });

  it('should print debug messages only when verbose', () => {
    new BaseCommand({}).debug('hidden');
    new BaseCommand({ verbose: true }).debug('shown');

    expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] shown');
  });

  it('should hide info in quiet mode', () => {
    new BaseCommand({ quiet: true }).info('hidden');
    new BaseCommand({}).info('shown');

    expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    expect(consoleSpy.log).toHaveBeenCalledWith('shown');
  });

  it('should always print warnings and errors', () => {
    const cmd = new BaseCommand({ quiet: true });

    cmd.warn('careful');
    cmd.error('broken');

    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: careful');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: broken');
  });

  it('should use text markers without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('done');
    cmd.fail('failed');

    expect(consoleSpy.log.mock.calls).toEqual([['[OK] done'], ['[FAIL] failed']]);
  });

  it('should read global flags from commander values', () => {
    expect(toGlobalOptions({ verbose: true, color: false, config: 'a.json', root: 42 })).toEqual({
      verbose: true,
      quiet: false,
      color: false,
      config: 'a.json',
      root: undefined,
    });
  });

  it('should fall back to a default base command', () => {
    const program = createProgram();

    const base = getBaseCommand(program);

    expect(base).toBeInstanceOf(BaseCommand);
    base.debug('hidden');
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should exit with the given code on fatal', () => {
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    try {
      expect(() => new BaseCommand({}).fatal('bad flag', EXIT_CODES.USAGE_ERROR)).toThrow('exit 2');
      expect(consoleSpy.error).toHaveBeenCalledWith('Error: bad flag');
    } finally {
      exitSpy.mockRestore();
    }
  });
});

// ============================================================================
// Formatter Tests
// ============================================================================

describe('Formatters', () => {
  const unitFailure: StageFailure = {
    stage: 'translate',
    target: 'mod/b',
    kind: 'TranslationError',
    message: 'Translation of mod/b failed: rate limited',
  };

  it('should format durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(90000)).toBe('1m 30s');
  });

  it('should mark unit failures as retried', () => {
    const output = formatErrorSummary([
      unitFailure,
      { stage: 'download', target: 'pack-b', kind: 'DownloadError', message: 'Download failed: network down' },
    ]);

    expect(output.split('\n')).toEqual([
      'Failures:',
      '  ! translate mod/b (retried next run)',
      '    Translation of mod/b failed: rate limited',
      '  ✘ download pack-b',
      '    Download failed: network down',
    ]);
  });

  it('should summarize a modpack', () => {
    const result: ModpackResult = {
      slug: 'pack-a',
      success: true,
      stages: [
        { stage: 'download', executed: [], skipped: ['pack-a'], failures: [], durationMs: 1 },
        { stage: 'translate', executed: ['mod/a', 'mod/b'], skipped: [], failures: [unitFailure], durationMs: 2 },
      ],
      stagesBlocked: [],
      failures: [unitFailure],
      unitCount: 3,
      unitStates: { done: 2, pending: 0, failed: ['mod/b'] },
      packages: {
        resourcepack: {
          path: path.join('/data', 'output', 'pack-a', 'pack-a-localization-resourcepack.zip'),
          sizeBytes: 2048,
          unitCount: 2,
        },
        overrides: {
          path: path.join('/data', 'output', 'pack-a', 'pack-a-localization-overrides.zip'),
          sizeBytes: 22,
          unitCount: 0,
        },
      },
      timing: {
        startedAt: '2026-01-01T00:00:00.000Z',
        completedAt: '2026-01-01T00:00:02.400Z',
        durationMs: 2400,
        perStage: {},
      },
    };

    expect(formatModpackSummary(result, '/data').split('\n')).toEqual([
      '=== pack-a ===',
      'Status:   SUCCESS (with unit failures)',
      'Duration: 2.4s',
      'Units:    3',
      'Ledger:   2 done, 1 failed (mod/b)',
      '',
      'Stages:',
      '  download   0 executed, 1 skipped',
      '  translate  2 executed, 0 skipped, 1 failed',
      '',
      'Packages:',
      '  resourcepack  output/pack-a/pack-a-localization-resourcepack.zip (2 units, 2.00 KB)',
      '  overrides     output/pack-a/pack-a-localization-overrides.zip (0 units, 22 B)',
      '',
      'Failures:',
      '  ! translate mod/b (retried next run)',
      '    Translation of mod/b failed: rate limited',
    ]);
  });

  it('should print a one-line status per modpack', () => {
    const result: ModpackResult = {
      slug: 'pack-a',
      success: true,
      stages: [],
      stagesBlocked: [],
      failures: [unitFailure],
      unitCount: 3,
      timing: {
        startedAt: '2026-01-01T00:00:00.000Z',
        completedAt: '2026-01-01T00:00:02.400Z',
        durationMs: 2400,
        perStage: {},
      },
    };

    expect(formatModpackStatusLine(result)).toBe('✔ pack-a (3 units, 1 failure(s), 2.4s)');
    expect(formatModpackStatusLine({ ...result, success: false, failures: [] })).toBe('✘ pack-a (3 units, 2.4s)');
  });

  it('should summarize the unit state ledger', () => {
    expect(formatLedgerSummary({ done: 0, pending: 0, failed: [] })).toBe('0 done, 0 failed');
    expect(formatLedgerSummary({ done: 4, pending: 2, failed: ['mod/a', 'kubejs/kubejs'] })).toBe(
      '4 done, 2 pending, 2 failed (mod/a, kubejs/kubejs)'
    );
  });

  it('should break down timing by stage', () => {
    expect(formatTimingBreakdown({ perStage: { package: 300, download: 100 }, durationMs: 400 }).split('\n')).toEqual([
      '=== Timing Breakdown ===',
      `download   ${'█'.repeat(10)} 100ms (25%)`,
      `package    ${'█'.repeat(30)} 300ms (75%)`,
      'Total      400ms',
    ]);
  });

  it('should align the status table', () => {
    const output = formatStatusTable([
      { unitId: 'mod/create', keys: 12, translated: 'present', state: 'done' },
      { unitId: 'kubejs/kubejs', keys: 0, translated: 'stale', state: 'failed', reason: 'timed out' },
    ]);

    expect(output.split('\n')).toEqual([
      'UNIT           KEYS  TRANSLATED  STATE',
      'mod/create     12    present     done',
      'kubejs/kubejs  0     stale       failed',
      '  timed out',
    ]);
  });

  it('should say when nothing is extracted', () => {
    expect(formatStatusTable([])).toBe('No units extracted yet.');
  });
});

// ============================================================================
// Status and Clean
// ============================================================================

describe('status and clean', () => {
  let rootDir: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
    store = new ArtifactStore(rootDir);

    await store.writeCategory(
      'pack-a',
      'mod',
      new Map<string, Record<string, string>>([
        ['create', { a: 'A' }],
        ['ae2', { b: 'B', c: 'C' }],
      ])
    );
    const record = {
      schemaVersion: SCHEMA_VERSIONS.unitRecord,
      createdAt: '2026-01-01T00:00:00.000Z',
      counts: { total: 1, dictionary: 0, llm: 1, passthrough: 0 },
      untranslatedKeys: [],
    };
    await store.write('pack-a', 'translated', { category: 'mod', name: 'create' }, {
      entries: { a: '甲' },
      record: { ...record, category: 'mod', name: 'create', sourceHash: hashEntrySet({ a: 'A' }) },
    });
    await store.write('pack-a', 'translated', { category: 'mod', name: 'ae2' }, {
      entries: { b: '乙' },
      record: { ...record, category: 'mod', name: 'ae2', sourceHash: '0'.repeat(64) },
    });
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('should report present and stale translations', async () => {
    const status = await inspectModpack(store, 'pack-a');

    expect(status).toEqual({
      slug: 'pack-a',
      downloaded: false,
      modpack: null,
      units: [
        { unitId: 'mod/ae2', keys: 2, translated: 'stale', state: '-', reason: undefined },
        { unitId: 'mod/create', keys: 1, translated: 'present', state: '-', reason: undefined },
      ],
      unitStates: { done: 0, pending: 0, failed: [] },
      packages: { resourcepack: false, overrides: false },
    });
  });

  it('should remove listed units and mark them pending', async () => {
    const removed = await cleanArtifacts(store, 'pack-a', 'translated', {
      units: [
        { category: 'mod', name: 'create' },
        { category: 'mod', name: 'missing' },
      ],
    });

    expect(removed).toEqual(['mod/create']);
    expect(await store.exists('pack-a', 'translated', { category: 'mod', name: 'create' })).toBe(false);
    expect(await store.exists('pack-a', 'translated', { category: 'mod', name: 'ae2' })).toBe(true);
    expect((await loadLedger(rootDir, 'pack-a')).units['mod/create']?.status).toBe('pending');
  });

  it('should remove a whole category', async () => {
    const removed = await cleanArtifacts(store, 'pack-a', 'extracted', { category: 'mod' });

    expect(removed).toEqual(['mod/ae2', 'mod/create']);
    expect(await store.categoryExists('pack-a', 'extracted', 'mod')).toBe(false);
    expect(await store.categoryExists('pack-a', 'translated', 'mod')).toBe(true);
  });

  it('should reject a unit id that escapes the category directory', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    try {
      await expect(
        createProgram().parseAsync(['node', 'modpack-localizer', '--root', rootDir, 'clean', 'pack-a', '-u', 'mod/..'])
      ).rejects.toThrow('exit 2');
      expect(errorSpy).toHaveBeenCalledWith(
        'Error: Invalid unit id: mod/... Expected <category>/<name>, e.g. mod/create'
      );
      expect(await store.exists('pack-a', 'translated', { category: 'mod', name: 'create' })).toBe(true);
    } finally {
      exitSpy.mockRestore();
      errorSpy.mockRestore();
    }
  });

  it('should leave the ledger alone when nothing was removed', async () => {
    expect(await cleanArtifacts(store, 'pack-a', 'translated', { category: 'kubejs' })).toEqual([]);
    expect((await loadLedger(rootDir, 'pack-a')).units).toEqual({});
  });
});

// ============================================================================
// Update Check
// ============================================================================

describe('checkModpackUpdate', () => {
  const status: ModpackStatus = {
    slug: 'pack-a',
    downloaded: true,
    modpack: {
      schemaVersion: SCHEMA_VERSIONS.modpackInfo,
      slug: 'pack-a',
      name: 'Pack A',
      version: '1.0',
      projectId: 100,
      fileId: 6,
      fileName: 'PackA-0.9.zip',
      mcVersion: '1.20.1',
      downloadedAt: '2026-01-01T00:00:00.000Z',
    },
    units: [],
    unitStates: { done: 0, pending: 0, failed: [] },
    packages: { resourcepack: false, overrides: false },
  };

  it('should not ask about a modpack that was never downloaded', async () => {
    const checker: UpdateChecker = {
      checkForUpdate: jest.fn<UpdateChecker['checkForUpdate']>(() => Promise.reject(new Error('not used'))),
    };
    const absent: ModpackStatus = { ...status, downloaded: false, modpack: null };

    expect(await checkModpackUpdate(checker, absent)).toBe(absent);
    expect(checker.checkForUpdate).not.toHaveBeenCalled();
  });

  it('should attach the newest file to a downloaded modpack', async () => {
    const calls: Array<[string, number]> = [];
    const checker: UpdateChecker = {
      checkForUpdate: (slug, currentFileId) => {
        calls.push([slug, currentFileId]);
        return Promise.resolve({
          currentFileId,
          latestFileId: 7,
          latestFileName: 'PackA-1.0.zip',
          updateAvailable: true,
        });
      },
    };

    const checked = await checkModpackUpdate(checker, status);

    expect(calls).toEqual([['pack-a', 6]]);
    expect(checked.update).toEqual({
      currentFileId: 6,
      latestFileId: 7,
      latestFileName: 'PackA-1.0.zip',
      updateAvailable: true,
    });
    expect(checked.updateError).toBeUndefined();
  });

  it('should record a failed check instead of throwing', async () => {
    const checker: UpdateChecker = {
      checkForUpdate: () => Promise.reject(new Error('HTTP 503')),
    };

    const checked = await checkModpackUpdate(checker, status);

    expect(checked.updateError).toBe('HTTP 503');
    expect(checked.update).toBeUndefined();
  });
});

// ============================================================================
// Run Command Exit Codes
// ============================================================================

describe('run command', () => {
  let rootDir: string;
  let configPath: string;
  let savedApiKey: string | undefined;
  let spies: jest.SpiedFunction<typeof console.log>[];

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-run-test-'));
    const dictionaryPath = path.join(rootDir, 'dict.json');
    await fs.writeFile(dictionaryPath, '{}');
    configPath = path.join(rootDir, 'localization.config.json');
    await fs.writeFile(
      configPath,
      JSON.stringify({ modpacks: { slugs: ['pack-a'] }, dictionary: { path: dictionaryPath } })
    );

    savedApiKey = process.env.CURSEFORGE_API_KEY;
    process.env.CURSEFORGE_API_KEY = '';
    spies = [
      jest.spyOn(console, 'log').mockImplementation(() => {}),
      jest.spyOn(console, 'warn').mockImplementation(() => {}),
      jest.spyOn(console, 'error').mockImplementation(() => {}),
    ];
  });

  afterEach(async () => {
    for (const spy of spies) {
      spy.mockRestore();
    }
    if (savedApiKey === undefined) {
      delete process.env.CURSEFORGE_API_KEY;
    } else {
      process.env.CURSEFORGE_API_KEY = savedApiKey;
    }
    process.exitCode = undefined;
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  function runCli(): Promise<unknown> {
    return createProgram().parseAsync([
      'node',
      'modpack-localizer',
      '-q',
      '--root',
      rootDir,
      '-c',
      configPath,
      'run',
      '--no-llm',
    ]);
  }

  it('should exit non-zero when a modpack cannot be downloaded', async () => {
    await runCli();

    expect(process.exitCode).toBe(EXIT_CODES.ERROR);
    expect(await fileExists(getPackagePath(rootDir, 'pack-a', 'resourcepack'))).toBe(false);
  });

  it('should exit zero when only a unit failed and the packages were written', async () => {
    const store = new ArtifactStore(rootDir);
    await store.writeDownload(
      'pack-a',
      {
        archive: Buffer.from('archive'),
        info: {
          schemaVersion: SCHEMA_VERSIONS.modpackInfo,
          slug: 'pack-a',
          name: 'Pack A',
          version: '1.0',
          projectId: 100,
          fileId: 6,
          fileName: 'PackA-1.0.zip',
          mcVersion: '1.20.1',
          downloadedAt: '2026-01-01T00:00:00.000Z',
        },
      },
      async (instanceDir) => {
        await fs.mkdir(path.join(instanceDir, 'mods'));
      }
    );
    await store.writeCategory('pack-a', 'mod', new Map<string, Record<string, string>>([['alpha', { a: 'A' }]]));
    const unitDir = getUnitDir(rootDir, 'pack-a', 'translated', { category: 'mod', name: 'alpha' });
    await fs.mkdir(unitDir, { recursive: true });
    await fs.writeFile(path.join(unitDir, ENTRIES_FILE), JSON.stringify({ a: '甲' }));
    await fs.writeFile(path.join(unitDir, UNIT_RECORD_FILE), '{}');

    await runCli();

    expect(process.exitCode).toBe(EXIT_CODES.SUCCESS);
    expect((await loadLedger(rootDir, 'pack-a')).units['mod/alpha']?.status).toBe('failed');
    expect(await fileExists(getPackagePath(rootDir, 'pack-a', 'resourcepack'))).toBe(true);
  });
});
