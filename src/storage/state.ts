/**
 * Unit State Ledger Storage
 *
 * Persists the per-modpack unit state ledger at work/<slug>/state.json.
 *
 * @module storage/state
 */

import {
  UnitStateLedgerSchema,
  createEmptyLedger,
  type LedgerSummary,
  type UnitStateLedger,
  type UnitStatus,
} from '../schemas/state.js';
import { atomicWriteJson, fileExists, readJson } from './atomic.js';
import { getStateFilePath } from './paths.js';

/**
 * Load a modpack's ledger.
 *
 * Returns an empty ledger if the file doesn't exist.
 *
 * @throws Error if the file exists but is invalid
 */
export async function loadLedger(root: string, slug: string): Promise<UnitStateLedger> {
  const filePath = getStateFilePath(root, slug);
  if (!(await fileExists(filePath))) {
    return createEmptyLedger(slug);
  }
  return UnitStateLedgerSchema.parse(await readJson(filePath));
}

/**
 * Save a modpack's ledger.
 */
export async function saveLedger(root: string, ledger: UnitStateLedger): Promise<void> {
  const validated = UnitStateLedgerSchema.parse(ledger);
  await atomicWriteJson(getStateFilePath(root, ledger.slug), validated);
}

/**
 * Return a ledger with the given unit statuses applied.
 * Units not mentioned keep their previous status.
 */
export function applyStatuses(
  ledger: UnitStateLedger,
  updates: Record<string, UnitStatus>
): UnitStateLedger {
  return {
    ...ledger,
    units: { ...ledger.units, ...updates },
  };
}

/**
 * Unit ids whose last recorded status is failed.
 */
export function listFailedUnits(ledger: UnitStateLedger): string[] {
  return Object.entries(ledger.units)
    .filter(([, status]) => status.status === 'failed')
    .map(([unitId]) => unitId)
    .sort();
}

/**
 * Count a ledger's units by state.
 */
export function summarizeLedger(ledger: UnitStateLedger): LedgerSummary {
  const statuses = Object.values(ledger.units);
  return {
    done: statuses.filter((status) => status.status === 'done').length,
    pending: statuses.filter((status) => status.status === 'pending').length,
    failed: listFailedUnits(ledger),
  };
}
