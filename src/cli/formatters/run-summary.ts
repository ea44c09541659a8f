/**
 * Run Summary Formatters
 *
 * CLI output for pipeline results:
 * - Per-modpack summary
 * - Whole-run summary
 * - Failure list and timing breakdown
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import * as path from 'node:path';
import type { ModpackResult, RunResult } from '../../pipeline/executor.js';
import { STAGE_NAMES, type StageFailure, type StageName } from '../../pipeline/types.js';
import { formatFileSize } from '../../export/zip.js';
import type { LedgerSummary } from '../../schemas/state.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format a duration for display.
 *
 * @example formatDuration(1500) // "1.5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

function displayPath(filePath: string, cwd: string): string {
  const relative = path.relative(cwd, filePath);
  return relative.startsWith('..') || path.isAbsolute(relative) ? filePath : relative;
}

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format the outcome of one modpack.
 *
 * @example
 * ```
 * === pack-a ===
 * Status:   SUCCESS
 * Duration: 2.4s
 * Units:    3
 * Ledger:   2 done, 1 failed (mod/botania)
 *
 * Stages:
 *   download   0 executed, 1 skipped
 *   extract    3 executed, 0 skipped
 *   translate  3 executed, 0 skipped
 *   package    2 executed, 0 skipped
 *
 * Packages:
 *   resourcepack  output/pack-a/pack-a-localization-resourcepack.zip (2 units, 1.20 KB)
 *   overrides     output/pack-a/pack-a-localization-overrides.zip (0 units, 22 B)
 * ```
 */
export function formatModpackSummary(result: ModpackResult, cwd: string = process.cwd()): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`=== ${result.slug} ===`));
  const status = result.success
    ? result.failures.length > 0
      ? chalk.yellow('SUCCESS (with unit failures)')
      : chalk.green('SUCCESS')
    : chalk.red('FAILED');
  lines.push(`Status:   ${status}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);
  lines.push(`Units:    ${result.unitCount}`);
  if (result.unitStates) {
    lines.push(`Ledger:   ${formatLedgerSummary(result.unitStates)}`);
  }
  lines.push('');

  lines.push('Stages:');
  for (const report of result.stages) {
    const failed = report.failures.length > 0 ? chalk.red(`, ${report.failures.length} failed`) : '';
    lines.push(
      `  ${report.stage.padEnd(10)} ${report.executed.length} executed, ${report.skipped.length} skipped${failed}`
    );
  }
  for (const stage of result.stagesBlocked) {
    lines.push(`  ${stage.padEnd(10)} ${chalk.dim('not run (upstream failed)')}`);
  }

  if (result.packages) {
    lines.push('');
    lines.push('Packages:');
    const { resourcepack, overrides } = result.packages;
    for (const [kind, archive] of [
      ['resourcepack', resourcepack],
      ['overrides', overrides],
    ] as const) {
      lines.push(
        `  ${kind.padEnd(13)} ${displayPath(archive.path, cwd)} ` +
          `(${archive.unitCount} units, ${formatFileSize(archive.sizeBytes)})`
      );
    }
  }

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(formatErrorSummary(result.failures));
  }

  return lines.join('\n');
}

/**
 * Format the outcome of a whole run: one block per modpack, then a
 * status line.
 */
export function formatRunSummary(result: RunResult, cwd: string = process.cwd()): string {
  const blocks = result.modpacks.map((modpack) => formatModpackSummary(modpack, cwd));
  const failed = result.modpacks.filter((modpack) => !modpack.success).length;

  const status = result.success
    ? chalk.green(`✔ ${result.modpacks.length} modpack(s) localized`)
    : chalk.red(`✘ ${failed} of ${result.modpacks.length} modpack(s) failed`);
  blocks.push(`${status} ${chalk.dim(`(${formatDuration(result.timing.durationMs)})`)}`);

  return blocks.join('\n\n');
}

/**
 * Format stage failures for display.
 *
 * Unit-level failures are marked as retried next run; the others stopped
 * part of the modpack.
 */
export function formatErrorSummary(failures: readonly StageFailure[]): string {
  const lines: string[] = [chalk.bold.red('Failures:')];

  for (const failure of failures) {
    const retried = failure.kind === 'TranslationError';
    const icon = retried ? chalk.yellow('!') : chalk.red('✘');
    const label = retried ? chalk.dim(' (retried next run)') : '';
    lines.push(`  ${icon} ${failure.stage} ${failure.target}${label}`);
    lines.push(`    ${chalk.dim(failure.message)}`);
  }

  return lines.join('\n');
}

/**
 * Format per-stage timing breakdown.
 */
export function formatTimingBreakdown(timing: {
  perStage: Partial<Record<StageName, number>>;
  durationMs: number;
}): string {
  const lines: string[] = [chalk.bold('=== Timing Breakdown ===')];

  const stages = STAGE_NAMES.flatMap((stage): Array<[StageName, number]> => {
    const ms = timing.perStage[stage];
    return ms === undefined ? [] : [[stage, ms]];
  });
  const maxDuration = Math.max(...stages.map(([, ms]) => ms), 1);
  const barWidth = 30;

  for (const [stage, durationMs] of stages) {
    const percentage = timing.durationMs > 0 ? Math.round((durationMs / timing.durationMs) * 100) : 0;
    const bar = chalk.green('█'.repeat(Math.round((durationMs / maxDuration) * barWidth)));
    lines.push(`${stage.padEnd(10)} ${bar} ${formatDuration(durationMs)} (${percentage}%)`);
  }

  lines.push(`${'Total'.padEnd(10)} ${formatDuration(timing.durationMs)}`);
  return lines.join('\n');
}

/**
 * One-line view of a ledger summary, e.g. "2 done, 1 failed (mod/botania)".
 */
export function formatLedgerSummary(summary: LedgerSummary): string {
  const parts = [`${summary.done} done`];
  if (summary.pending > 0) {
    parts.push(`${summary.pending} pending`);
  }
  const failed =
    summary.failed.length > 0
      ? chalk.red(`${summary.failed.length} failed (${summary.failed.join(', ')})`)
      : '0 failed';
  parts.push(failed);
  return parts.join(', ');
}

/**
 * Compact one-line status of a modpack.
 */
export function formatModpackStatusLine(result: ModpackResult): string {
  const status = result.success ? chalk.green('✔') : chalk.red('✘');
  const failures = result.failures.length > 0 ? `, ${result.failures.length} failure(s)` : '';
  return `${status} ${result.slug} (${result.unitCount} units${failures}, ${formatDuration(result.timing.durationMs)})`;
}
