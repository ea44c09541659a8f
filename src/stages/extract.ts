/**
 * Extract Stage
 *
 * Runs each category's extractor whose category artifact is absent. When
 * the category is present but some of its recorded mod leaves were deleted,
 * the extractor runs again and only those leaves are restored. A failing
 * extractor records an ExtractionError for its category; the other
 * categories still run.
 *
 * @module stages/extract
 */

import { UNIT_CATEGORIES, type UnitCategory } from '../schemas/unit.js';
import { ExtractionError, errorMessage } from '../pipeline/errors.js';
import type { ModpackRun, Stage, StageContext, StageReport } from '../pipeline/types.js';
import { ReportBuilder } from './report.js';

export const extractStage: Stage = {
  name: 'extract',

  async execute(context: StageContext, run: ModpackRun): Promise<StageReport> {
    const { slug, store, collaborators, logger } = context;
    const report = new ReportBuilder('extract');
    const present: UnitCategory[] = [];

    const extractors = [...collaborators.extractors].sort(
      (a, b) => UNIT_CATEGORIES.indexOf(a.category) - UNIT_CATEGORIES.indexOf(b.category)
    );

    for (const extractor of extractors) {
      const { category } = extractor;

      const categoryPresent = await store.categoryExists(slug, 'extracted', category);
      const missing = categoryPresent ? await store.listMissingUnits(slug, category) : [];
      if (categoryPresent && missing.length === 0) {
        report.skippedTarget(category);
        present.push(category);
        continue;
      }

      try {
        const units = await extractor.extract(store.instanceDir(slug), logger);
        if (categoryPresent) {
          for (const name of missing) {
            const entries = units.get(name);
            if (entries === undefined) {
              logger.warn(`[${slug}] ${category}/${name} is no longer produced by the extractor`);
              continue;
            }
            await store.writeExtractedUnit(slug, name, entries);
          }
          logger.info(`[${slug}] Restored ${category}: ${missing.length} unit(s)`);
        } else {
          await store.writeCategory(slug, category, units);
          logger.info(`[${slug}] Extracted ${category}: ${units.size} unit(s)`);
        }
        report.executedTarget(category);
        present.push(category);
      } catch (error) {
        const failure = new ExtractionError(
          slug,
          category,
          `Extraction of ${category} failed: ${errorMessage(error)}`,
          { cause: error }
        );
        report.failed(category, failure);
        logger.error(`[${slug}] ${failure.message}`);
      }
    }

    run.extractedCategories = present;
    return report.build();
  },
};
