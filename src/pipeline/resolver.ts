/**
 * Unit Resolver
 *
 * Enumerates the translation units present in a modpack's extraction root.
 *
 * @module pipeline/resolver
 */

import { UNIT_CATEGORIES, compareUnits, type UnitKey } from '../schemas/unit.js';
import type { ArtifactStore } from '../storage/artifact-store.js';

export class UnitResolver {
  constructor(private readonly store: ArtifactStore) {}

  /**
   * Units of a modpack, sorted by category (mod, kubejs, ftbquests) then by
   * name in code-unit order. A unit with zero entries is still listed.
   */
  async resolve(slug: string): Promise<UnitKey[]> {
    const units: UnitKey[] = [];
    for (const category of UNIT_CATEGORIES) {
      for (const name of await this.store.listUnitNames(slug, 'extracted', category)) {
        units.push({ slug, category, name });
      }
    }
    return units.sort(compareUnits);
  }
}
