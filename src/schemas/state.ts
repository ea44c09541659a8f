/**
 * Unit State Ledger Schema
 *
 * Per-modpack record of the last known state of each unit's translation:
 * done, or failed with a reason. Failed units are retried on the next run.
 * The ledger never decides whether work is skipped; artifact presence does.
 *
 * @module schemas/state
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, SlugSchema } from './common.js';

export const UnitStatusSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('pending'),
    updatedAt: ISO8601TimestampSchema,
  }),
  z.object({
    status: z.literal('done'),
    updatedAt: ISO8601TimestampSchema,
  }),
  z.object({
    status: z.literal('failed'),
    reason: z.string(),
    updatedAt: ISO8601TimestampSchema,
  }),
]);

export type UnitStatus = z.infer<typeof UnitStatusSchema>;

export const UnitStateLedgerSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.unitState),
  slug: SlugSchema,
  /** Keyed by unit id ("mod/create", "kubejs/kubejs", ...) */
  units: z.record(z.string(), UnitStatusSchema),
});

export type UnitStateLedger = z.infer<typeof UnitStateLedgerSchema>;

/**
 * Counts of a ledger's unit states, with the failed unit ids spelled out.
 */
export interface LedgerSummary {
  done: number;
  pending: number;
  /** Sorted unit ids */
  failed: string[];
}

/**
 * Create an empty ledger for a modpack.
 */
export function createEmptyLedger(slug: string): UnitStateLedger {
  return {
    schemaVersion: SCHEMA_VERSIONS.unitState,
    slug,
    units: {},
  };
}
