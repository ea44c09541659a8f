/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  formatDuration,
  formatModpackSummary,
  formatRunSummary,
  formatErrorSummary,
  formatTimingBreakdown,
  formatModpackStatusLine,
  formatLedgerSummary,
} from './run-summary.js';

export { formatStatusTable, type UnitStatusRow } from './status-table.js';
