/**
 * Translate Stage
 *
 * Resolves the modpack's units, then translates every unit whose translated
 * artifact is absent or stale (its recorded source hash no longer matches
 * the extracted entries). Units run on a bounded pool; a failing unit
 * records a TranslationError and leaves its siblings alone. The outcome of
 * each unit is written to the state ledger.
 *
 * @module stages/translate
 */

import { formatUnitId, type UnitKey } from '../schemas/unit.js';
import { createEmptyLedger, type UnitStateLedger, type UnitStatus } from '../schemas/state.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { TranslationError, errorMessage } from '../pipeline/errors.js';
import type { Logger, ModpackRun, Stage, StageContext, StageReport } from '../pipeline/types.js';
import { mapSettled } from '../pipeline/concurrency.js';
import { UnitResolver } from '../pipeline/resolver.js';
import { hashEntrySet } from '../storage/artifact-store.js';
import { loadLedger, saveLedger, summarizeLedger } from '../storage/state.js';
import { translateEntries, type PreviousTranslation } from '../translation/translate.js';
import { ReportBuilder } from './report.js';

type UnitOutcome = 'translated' | 'skipped';

/**
 * Translate one unit unless an up-to-date translation is present.
 *
 * @throws TranslationError on any failure
 */
export async function translateUnit(context: StageContext, unit: UnitKey): Promise<UnitOutcome> {
  const { slug, store, collaborators, config, logger, signal } = context;
  const unitId = formatUnitId(unit);

  try {
    const extracted = await store.read(slug, 'extracted', unit);
    if (extracted === null) {
      throw new Error('extracted entries are missing');
    }
    const sourceHash = hashEntrySet(extracted);

    let previous: PreviousTranslation | undefined;
    if (await store.exists(slug, 'translated', unit)) {
      const existing = await store.readTranslation(slug, unit);
      if (existing?.record.sourceHash === sourceHash) {
        return 'skipped';
      }
      logger.info(`[${slug}] ${unitId} is stale, translating again`);
      if (existing?.source !== undefined) {
        previous = {
          source: existing.source,
          entries: existing.entries,
          untranslatedKeys: existing.record.untranslatedKeys,
        };
      }
    }

    const { llm } = config.translation;
    const outcome = await translateEntries(extracted, {
      dictionary: collaborators.dictionary,
      translator: llm.enabled ? collaborators.translator : undefined,
      batchSize: llm.batchSize,
      timeoutMs: llm.timeoutMs,
      previous,
      signal,
    });

    await store.write(slug, 'translated', unit, {
      entries: outcome.entries,
      record: {
        schemaVersion: SCHEMA_VERSIONS.unitRecord,
        category: unit.category,
        name: unit.name,
        sourceHash,
        createdAt: new Date().toISOString(),
        counts: outcome.counts,
        untranslatedKeys: outcome.untranslatedKeys,
      },
      source: extracted,
    });

    const { counts } = outcome;
    logger.debug(
      `[${slug}] ${unitId}: ${counts.total} keys ` +
        `(dictionary ${counts.dictionary}, llm ${counts.llm}, passthrough ${counts.passthrough}, ` +
        `reused ${outcome.reused})`
    );
    return 'translated';
  } catch (error) {
    if (error instanceof TranslationError) {
      throw error;
    }
    throw new TranslationError(slug, unitId, `Translation of ${unitId} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * The ledger only informs reporting, so an unreadable one is replaced.
 */
async function loadLedgerOrEmpty(root: string, slug: string, logger: Logger): Promise<UnitStateLedger> {
  try {
    return await loadLedger(root, slug);
  } catch (error) {
    logger.warn(`[${slug}] Unit state ledger unreadable, starting a new one: ${errorMessage(error)}`);
    return createEmptyLedger(slug);
  }
}

export const translateStage: Stage = {
  name: 'translate',

  async execute(context: StageContext, run: ModpackRun): Promise<StageReport> {
    const { slug, store, config, logger, events } = context;
    const report = new ReportBuilder('translate');

    let units: UnitKey[];
    try {
      units = await new UnitResolver(store).resolve(slug);
    } catch (error) {
      const failure = new TranslationError(slug, 'units', `Unit resolution failed: ${errorMessage(error)}`, {
        cause: error,
      });
      report.failed('units', failure);
      logger.warn(`[${slug}] ${failure.message}`);
      return report.build();
    }
    run.units = units;
    logger.info(`[${slug}] ${units.length} unit(s) resolved`);

    const ledger = await loadLedgerOrEmpty(store.root, slug, logger);
    const statuses: Record<string, UnitStatus> = {};

    const results = await mapSettled(units, config.concurrency.units, (unit) => translateUnit(context, unit));

    results.forEach((result, index) => {
      const unitId = formatUnitId(units[index]);
      const now = new Date().toISOString();

      if (result.status === 'fulfilled') {
        if (result.value === 'skipped') {
          report.skippedTarget(unitId);
          const previous = ledger.units[unitId];
          statuses[unitId] = previous?.status === 'done' ? previous : { status: 'done', updatedAt: now };
          events.onUnitSkip?.(slug, unitId);
        } else {
          report.executedTarget(unitId);
          statuses[unitId] = { status: 'done', updatedAt: now };
          events.onUnitComplete?.(slug, unitId);
        }
        return;
      }

      const failure =
        result.reason instanceof TranslationError
          ? result.reason
          : new TranslationError(slug, unitId, errorMessage(result.reason), { cause: result.reason });
      report.failed(unitId, failure);
      statuses[unitId] = { status: 'failed', reason: failure.message, updatedAt: now };
      logger.warn(`[${slug}] ${failure.message}`);
      events.onUnitError?.(slug, unitId, failure);
    });

    const updated: UnitStateLedger = { ...ledger, units: statuses };
    run.unitStates = summarizeLedger(updated);
    try {
      await saveLedger(store.root, updated);
    } catch (error) {
      const failure = new TranslationError(slug, 'state', `Saving unit states failed: ${errorMessage(error)}`, {
        cause: error,
      });
      report.failed('state', failure);
      logger.warn(`[${slug}] ${failure.message}`);
    }
    return report.build();
  },
};
