/**
 * Pipeline Stages Exports
 *
 * @module stages
 */

import type { Stage } from '../pipeline/types.js';
import { downloadStage } from './download.js';
import { extractStage } from './extract.js';
import { packageStage } from './package.js';
import { translateStage } from './translate.js';

export { downloadStage } from './download.js';
export { extractStage } from './extract.js';
export { translateStage, translateUnit } from './translate.js';
export { packageStage, collectUnitEntries } from './package.js';
export { ReportBuilder, toStageFailure } from './report.js';

/**
 * The four built-in stages.
 */
export const DEFAULT_STAGES: readonly Stage[] = [downloadStage, extractStage, translateStage, packageStage];
