/**
 * Download Stage
 *
 * Fetches and installs the modpack when its download artifact is absent.
 * Any failure is a DownloadError and ends the modpack's pipeline.
 *
 * @module stages/download
 */

import { ModpackInfoSchema } from '../schemas/modpack.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { DownloadError, errorMessage } from '../pipeline/errors.js';
import type { FetchedModpack, ModpackRun, Stage, StageContext, StageReport } from '../pipeline/types.js';
import { installModpack } from '../download/installer.js';
import { ReportBuilder } from './report.js';

export const downloadStage: Stage = {
  name: 'download',

  async execute(context: StageContext, run: ModpackRun): Promise<StageReport> {
    const { slug, store, collaborators, logger, config, signal } = context;
    const report = new ReportBuilder('download');

    if (await store.downloadExists(slug)) {
      run.modpack = (await store.readModpackInfo(slug)) ?? undefined;
      report.skippedTarget(slug);
      logger.debug(`[${slug}] Download present, skipping`);
      return report.build();
    }

    logger.info(`[${slug}] Downloading modpack`);

    let fetched: FetchedModpack;
    try {
      fetched = await collaborators.source.fetch(slug, signal);
    } catch (error) {
      throw new DownloadError(slug, `Download failed: ${errorMessage(error)}`, { cause: error });
    }

    const info = ModpackInfoSchema.parse({
      ...fetched.info,
      schemaVersion: SCHEMA_VERSIONS.modpackInfo,
      downloadedAt: new Date().toISOString(),
    });

    try {
      const { archive } = fetched;
      await store.writeDownload(slug, { archive, info }, async (instanceDir) => {
        const result = await installModpack(archive, instanceDir, {
          source: collaborators.source,
          logger,
          concurrency: config.concurrency.units,
          signal,
        });
        logger.info(
          `[${slug}] Installed ${info.name} ${info.version} (${result.modFiles} mods, ${result.overrideFiles} override files)`
        );
      });
    } catch (error) {
      throw new DownloadError(slug, `Install failed: ${errorMessage(error)}`, { cause: error });
    }

    run.modpack = info;
    report.executedTarget(slug);
    return report.build();
  },
};
