/**
 * Translation Unit Schemas
 *
 * A translation unit is the smallest independently cacheable slice of
 * translatable text: one mod namespace, the KubeJS bundle, or the FTB Quests
 * bundle. Unit identity is (slug, category, name).
 *
 * @module schemas/unit
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, Sha256Schema, SlugSchema } from './common.js';

// ============================================================================
// Categories
// ============================================================================

/**
 * Unit categories in canonical processing order.
 */
export const UNIT_CATEGORIES = ['mod', 'kubejs', 'ftbquests'] as const;

export const UnitCategorySchema = z.enum(UNIT_CATEGORIES);

export type UnitCategory = z.infer<typeof UnitCategorySchema>;

/**
 * Categories that hold exactly one unit, named by a fixed sentinel.
 */
export const SINGLETON_UNIT_NAMES = {
  kubejs: 'kubejs',
  ftbquests: 'ftbquests',
} as const satisfies Partial<Record<UnitCategory, string>>;

// ============================================================================
// Unit Key
// ============================================================================

export const UnitKeySchema = z.object({
  slug: SlugSchema,
  category: UnitCategorySchema,
  /** Mod namespace for category=mod, sentinel for the others */
  name: z
    .string()
    .min(1)
    .refine((value) => !/(\.\.|[/\\])/.test(value) && !value.startsWith('.'), {
      message: 'Unit name contains invalid characters',
    }),
});

export type UnitKey = z.infer<typeof UnitKeySchema>;

/**
 * Build the key of a singleton-category unit.
 */
export function singletonUnit(slug: string, category: 'kubejs' | 'ftbquests'): UnitKey {
  return { slug, category, name: SINGLETON_UNIT_NAMES[category] };
}

/**
 * Stable string identifier for a unit, e.g. "mod/create" or "kubejs/kubejs".
 */
export function formatUnitId(unit: Pick<UnitKey, 'category' | 'name'>): string {
  return `${unit.category}/${unit.name}`;
}

/**
 * Parse a unit id back into category and name.
 *
 * @returns null when the id has no known category, an unsafe name, or a
 *   singleton category with a name other than its sentinel
 */
export function parseUnitId(id: string): Pick<UnitKey, 'category' | 'name'> | null {
  const slash = id.indexOf('/');
  if (slash <= 0) {
    return null;
  }
  const parsedCategory = UnitCategorySchema.safeParse(id.slice(0, slash));
  const name = id.slice(slash + 1);
  if (!parsedCategory.success || !UnitKeySchema.shape.name.safeParse(name).success) {
    return null;
  }
  const category = parsedCategory.data;
  if (category !== 'mod' && name !== SINGLETON_UNIT_NAMES[category]) {
    return null;
  }
  return { category, name };
}

/**
 * Order units by category (canonical order) then by name (code-unit order).
 */
export function compareUnits(
  a: Pick<UnitKey, 'category' | 'name'>,
  b: Pick<UnitKey, 'category' | 'name'>
): number {
  const byCategory = UNIT_CATEGORIES.indexOf(a.category) - UNIT_CATEGORIES.indexOf(b.category);
  if (byCategory !== 0) {
    return byCategory;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

// ============================================================================
// Entry Sets
// ============================================================================

/**
 * Ordered mapping from lang key to text. Insertion order is preserved on
 * disk and in every archive built from it.
 */
export const EntrySetSchema = z.record(z.string(), z.string());

export type EntrySet = z.infer<typeof EntrySetSchema>;

/**
 * Where a translated value came from.
 */
export const TranslationSourceSchema = z.enum(['dictionary', 'llm', 'passthrough']);

export type TranslationSource = z.infer<typeof TranslationSourceSchema>;

/**
 * A unit's translated entries plus the keys left untranslated.
 */
export interface TranslatedEntrySet {
  entries: EntrySet;
  untranslatedKeys: string[];
}

// ============================================================================
// Translated Unit Record
// ============================================================================

/**
 * Record written beside a unit's translated entries (unit.json).
 *
 * sourceHash is the SHA-256 of the extracted entries the translation was
 * produced from. A mismatch marks the translated artifact as stale.
 */
export const UnitRecordSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.unitRecord),
  category: UnitCategorySchema,
  name: z.string().min(1),
  sourceHash: Sha256Schema,
  createdAt: ISO8601TimestampSchema,
  counts: z.object({
    total: z.number().int().nonnegative(),
    dictionary: z.number().int().nonnegative(),
    llm: z.number().int().nonnegative(),
    passthrough: z.number().int().nonnegative(),
  }),
  untranslatedKeys: z.array(z.string()),
});

export type UnitRecord = z.infer<typeof UnitRecordSchema>;
