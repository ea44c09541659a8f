/**
 * Status Command
 *
 * Shows, per modpack, what the work tree holds: the download, each
 * extracted unit with its translation state, the unit state ledger, and the
 * packages. With --check-updates it also asks CurseForge whether a newer
 * modpack file exists; nothing is downloaded.
 *
 * @module cli/commands/status
 */

import { Command } from 'commander';
import { requireCurseForgeApiKey } from '../../config/index.js';
import { CurseForgeClient, type UpdateCheck } from '../../download/curseforge.js';
import { errorMessage } from '../../pipeline/errors.js';
import { UnitResolver } from '../../pipeline/resolver.js';
import type { ModpackInfo } from '../../schemas/modpack.js';
import type { LedgerSummary } from '../../schemas/state.js';
import { formatUnitId } from '../../schemas/unit.js';
import { ArtifactStore, hashEntrySet } from '../../storage/artifact-store.js';
import { fileExists } from '../../storage/atomic.js';
import { getPackagePath } from '../../storage/paths.js';
import { loadLedger, summarizeLedger } from '../../storage/state.js';
import { EXIT_CODES, getBaseCommand } from '../base-command.js';
import { formatLedgerSummary } from '../formatters/run-summary.js';
import { formatStatusTable, type UnitStatusRow } from '../formatters/status-table.js';
import { loadCommandConfig } from './common.js';

// ============================================================================
// Types
// ============================================================================

export interface ModpackStatus {
  slug: string;
  downloaded: boolean;
  modpack: ModpackInfo | null;
  units: UnitStatusRow[];
  unitStates: LedgerSummary;
  packages: {
    resourcepack: boolean;
    overrides: boolean;
  };
  /** Set by --check-updates for a downloaded modpack */
  update?: UpdateCheck;
  updateError?: string;
}

export interface StatusOptions {
  json?: boolean;
  checkUpdates?: boolean;
}

export interface UpdateChecker {
  checkForUpdate(slug: string, currentFileId: number, signal?: AbortSignal): Promise<UpdateCheck>;
}

// ============================================================================
// Inspection
// ============================================================================

/**
 * Read the state of one modpack's work tree. Never writes.
 */
export async function inspectModpack(store: ArtifactStore, slug: string): Promise<ModpackStatus> {
  const ledger = await loadLedger(store.root, slug);
  const units = await new UnitResolver(store).resolve(slug);
  const rows: UnitStatusRow[] = [];

  for (const unit of units) {
    const unitId = formatUnitId(unit);
    const extracted = (await store.read(slug, 'extracted', unit)) ?? {};
    const translation = await store.readTranslation(slug, unit);

    let translated: UnitStatusRow['translated'] = 'absent';
    if (translation !== null) {
      translated = translation.record.sourceHash === hashEntrySet(extracted) ? 'present' : 'stale';
    } else if (await store.exists(slug, 'translated', unit)) {
      translated = 'stale';
    }

    const status = ledger.units[unitId];
    rows.push({
      unitId,
      keys: Object.keys(extracted).length,
      translated,
      state: status?.status ?? '-',
      reason: status?.status === 'failed' ? status.reason : undefined,
    });
  }

  return {
    slug,
    downloaded: await store.downloadExists(slug),
    modpack: await store.readModpackInfo(slug),
    units: rows,
    unitStates: summarizeLedger(ledger),
    packages: {
      resourcepack: await fileExists(getPackagePath(store.root, slug, 'resourcepack')),
      overrides: await fileExists(getPackagePath(store.root, slug, 'overrides')),
    },
  };
}

/**
 * Compare a downloaded modpack with the newest CurseForge file. A modpack
 * not yet downloaded is returned unchanged; a failed check is recorded on
 * the status instead of thrown.
 */
export async function checkModpackUpdate(checker: UpdateChecker, status: ModpackStatus): Promise<ModpackStatus> {
  if (status.modpack === null) {
    return status;
  }
  try {
    return { ...status, update: await checker.checkForUpdate(status.slug, status.modpack.fileId) };
  } catch (error) {
    return { ...status, updateError: errorMessage(error) };
  }
}

function describeUpdate(status: ModpackStatus): string | undefined {
  if (status.updateError !== undefined) {
    return `check failed: ${status.updateError}`;
  }
  if (status.update === undefined) {
    return undefined;
  }
  return status.update.updateAvailable ? `available (${status.update.latestFileName})` : 'up to date';
}

// ============================================================================
// Handler
// ============================================================================

export async function statusHandler(slugs: string[], options: StatusOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const config = await loadCommandConfig(base, { slugs });
  const store = new ArtifactStore(config.rootDir);

  let checker: UpdateChecker | undefined;
  if (options.checkUpdates) {
    try {
      checker = new CurseForgeClient({ apiKey: requireCurseForgeApiKey(config) });
    } catch (error) {
      base.fatal(errorMessage(error), EXIT_CODES.USAGE_ERROR);
    }
  }

  const statuses: ModpackStatus[] = [];
  for (const slug of config.slugs) {
    const status = await inspectModpack(store, slug);
    statuses.push(checker ? await checkModpackUpdate(checker, status) : status);
  }

  if (options.json) {
    base.json(statuses);
    return;
  }

  for (const status of statuses) {
    base.section(status.slug);
    const version = status.modpack ? ` (${status.modpack.name} ${status.modpack.version})` : '';
    base.keyValue('Downloaded', status.downloaded ? `yes${version}` : 'no');
    const update = describeUpdate(status);
    if (update !== undefined) {
      base.keyValue('Update', update);
    }
    const stale = status.units.filter((row) => row.translated === 'stale').map((row) => row.unitId);
    base.keyValue('Stale units', stale.length > 0 ? stale.join(', ') : 'none');
    base.keyValue('Ledger', formatLedgerSummary(status.unitStates));
    base.keyValue('Resource pack', status.packages.resourcepack ? 'written' : 'missing');
    base.keyValue('Overrides', status.packages.overrides ? 'written' : 'missing');
    base.blank();
    base.print(formatStatusTable(status.units));
  }
}

/**
 * Register the status command.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status [slugs...]')
    .description('Show the artifacts recorded for each modpack')
    .option('--json', 'Print machine-readable JSON')
    .option('--check-updates', 'Ask CurseForge whether a newer modpack file exists')
    .action(async (slugs: string[], options: StatusOptions, cmd: Command) => {
      await statusHandler(slugs, options, cmd);
    });
}
