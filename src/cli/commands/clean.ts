/**
 * Clean Command
 *
 * Deletes a unit's or a category's artifacts so the next run recomputes
 * them, and marks the affected units pending in the ledger.
 *
 * @module cli/commands/clean
 */

import { Command } from 'commander';
import {
  UnitCategorySchema,
  compareUnits,
  formatUnitId,
  parseUnitId,
  type UnitCategory,
} from '../../schemas/unit.js';
import type { UnitStatus } from '../../schemas/state.js';
import { ArtifactStore, type UnitRef } from '../../storage/artifact-store.js';
import type { ArtifactStage } from '../../storage/paths.js';
import { applyStatuses, loadLedger, saveLedger } from '../../storage/state.js';
import { errorMessage } from '../../pipeline/errors.js';
import { BaseCommand, EXIT_CODES, getBaseCommand } from '../base-command.js';
import { collect, loadCommandConfig } from './common.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What to delete: listed units, or a whole category.
 */
export type CleanTarget = { units: UnitRef[] } | { category: UnitCategory };

export interface CleanOptions {
  unit?: string[];
  category?: string;
  stage?: string;
}

const CLEANABLE_STAGES: readonly ArtifactStage[] = ['extracted', 'translated'];

function isArtifactStage(value: string): value is ArtifactStage {
  return CLEANABLE_STAGES.some((stage) => stage === value);
}

// ============================================================================
// Cleaning
// ============================================================================

/**
 * Delete artifacts of one stage and reset the affected units to pending.
 *
 * @returns Ids of the units whose artifacts were removed, in unit order
 */
export async function cleanArtifacts(
  store: ArtifactStore,
  slug: string,
  stage: ArtifactStage,
  target: CleanTarget
): Promise<string[]> {
  const removed: UnitRef[] = [];

  if ('category' in target) {
    const names = await store.listUnitNames(slug, stage, target.category);
    if (await store.removeCategory(slug, stage, target.category)) {
      removed.push(...names.map((name) => ({ category: target.category, name })));
    }
  } else {
    for (const unit of target.units) {
      if (await store.remove(slug, stage, unit)) {
        removed.push(unit);
      }
    }
  }

  const unitIds = removed.sort(compareUnits).map(formatUnitId);
  if (unitIds.length > 0) {
    const updatedAt = new Date().toISOString();
    const pending: Record<string, UnitStatus> = {};
    for (const unitId of unitIds) {
      pending[unitId] = { status: 'pending', updatedAt };
    }
    await saveLedger(store.root, applyStatuses(await loadLedger(store.root, slug), pending));
  }
  return unitIds;
}

// ============================================================================
// Handler
// ============================================================================

export async function cleanHandler(slug: string, options: CleanOptions, cmd: Command): Promise<void> {
  const base: BaseCommand = getBaseCommand(cmd);

  const stage = options.stage ?? 'translated';
  if (!isArtifactStage(stage)) {
    base.fatal(`Invalid stage: ${stage}. Must be one of: ${CLEANABLE_STAGES.join(', ')}`, EXIT_CODES.USAGE_ERROR);
  }

  const units = options.unit ?? [];
  if ((units.length > 0) === (options.category !== undefined)) {
    base.fatal('Give either --unit (repeatable) or --category', EXIT_CODES.USAGE_ERROR);
  }

  let target: CleanTarget;
  if (options.category !== undefined) {
    const category = UnitCategorySchema.safeParse(options.category);
    if (!category.success) {
      base.fatal(
        `Invalid category: ${options.category}. Must be one of: ${UnitCategorySchema.options.join(', ')}`,
        EXIT_CODES.USAGE_ERROR
      );
    }
    target = { category: category.data };
  } else {
    const refs: UnitRef[] = [];
    for (const id of units) {
      const ref = parseUnitId(id);
      if (ref === null) {
        base.fatal(`Invalid unit id: ${id}. Expected <category>/<name>, e.g. mod/create`, EXIT_CODES.USAGE_ERROR);
      }
      refs.push(ref);
    }
    target = { units: refs };
  }

  const config = await loadCommandConfig(base, { slugs: [slug] });
  let removed: string[];
  try {
    removed = await cleanArtifacts(new ArtifactStore(config.rootDir), slug, stage, target);
  } catch (error) {
    base.fatal(`Clean failed: ${errorMessage(error)}`, error);
  }

  if (removed.length === 0) {
    base.warn(`Nothing to clean for ${slug}`);
    process.exitCode = EXIT_CODES.NOT_FOUND;
    return;
  }
  for (const unitId of removed) {
    base.success(`Removed ${stage} ${unitId}`);
  }
}

/**
 * Register the clean command.
 */
export function registerCleanCommand(program: Command): void {
  program
    .command('clean <slug>')
    .description('Delete unit or category artifacts so the next run recomputes them')
    .option('-u, --unit <id>', 'Unit id such as mod/create (repeatable)', collect, [])
    .option('--category <category>', 'Whole category: mod, kubejs or ftbquests')
    .option('--stage <stage>', 'extracted or translated', 'translated')
    .action(async (slug: string, options: CleanOptions, cmd: Command) => {
      await cleanHandler(slug, options, cmd);
    });
}
