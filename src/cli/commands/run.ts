/**
 * Run Command
 *
 * Runs the pipeline once per configured modpack and prints a summary.
 * Exits non-zero when any modpack failed to download, extract or package;
 * unit-level translation failures alone do not fail the run.
 *
 * @module cli/commands/run
 */

import { Command } from 'commander';
import { createCollaborators, createExecutor } from '../../app.js';
import type { ExecutorCallbacks } from '../../pipeline/executor.js';
import { errorMessage } from '../../pipeline/errors.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatModpackStatusLine, formatRunSummary, formatTimingBreakdown } from '../formatters/run-summary.js';
import { collect, loadCommandConfig } from './common.js';

// ============================================================================
// Types
// ============================================================================

export interface RunOptions {
  /** Restrict the run to these slugs */
  slug?: string[];
  /** Force LLM translation on or off */
  llm?: boolean;
  /** Print per-stage timing */
  timing?: boolean;
}

// ============================================================================
// Progress Rendering
// ============================================================================

/**
 * Executor callbacks that report progress through the base command.
 */
export function createProgressCallbacks(base: BaseCommand): ExecutorCallbacks {
  return {
    onModpackStart: (slug) => base.info(`[${slug}] Starting`),
    onStageStart: (slug, stage) => base.debug(`[${slug}] ${stage} started`),
    onStageComplete: (slug, report) => {
      const failed = report.failures.length > 0 ? `, ${report.failures.length} failed` : '';
      base.info(
        `[${slug}] ${report.stage}: ${report.executed.length} executed, ${report.skipped.length} skipped${failed}`
      );
    },
    onStageSkip: (slug, stage, blockedBy) => base.warn(`[${slug}] ${stage} not run: ${blockedBy} failed`),
    onUnitSkip: (slug, unitId) => base.debug(`[${slug}] ${unitId} up to date`),
    onUnitComplete: (slug, unitId) => base.debug(`[${slug}] ${unitId} translated`),
    onModpackComplete: (result) => base.info(formatModpackStatusLine(result)),
  };
}

// ============================================================================
// Handler
// ============================================================================

export async function runHandler(options: RunOptions, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const config = await loadCommandConfig(base, { slugs: options.slug, llmEnabled: options.llm });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    base.warn('Interrupted, stopping after in-flight work');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const collaborators = await createCollaborators(config, { logger: base, signal: controller.signal });
    const executor = createExecutor(config, collaborators, base);
    executor.setCallbacks(createProgressCallbacks(base));

    const result = await executor.execute(config.slugs, controller.signal);

    base.blank();
    base.print(formatRunSummary(result));
    if (options.timing) {
      for (const modpack of result.modpacks) {
        base.blank();
        base.print(`${modpack.slug}\n${formatTimingBreakdown(modpack.timing)}`);
      }
    }

    if (controller.signal.aborted) {
      process.exitCode = EXIT_CODES.CANCELLED;
    } else {
      process.exitCode = result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
    }
  } catch (error) {
    base.fatal(`Run failed: ${errorMessage(error)}`, error);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Download, extract, translate and package the configured modpacks')
    .option('-s, --slug <slug>', 'Process only this modpack (repeatable)', collect, [])
    .option('--llm', 'Send dictionary misses to the LLM')
    .option('--no-llm', 'Translate with the dictionary only')
    .option('--timing', 'Show per-stage timing')
    .action(async (options: RunOptions, cmd: Command) => {
      await runHandler(options, cmd);
    });
}
