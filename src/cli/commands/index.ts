/**
 * CLI Commands Registry
 *
 * Available commands:
 * - run: Run the pipeline for the configured modpacks
 * - status: Show recorded artifacts per modpack and unit
 * - clean: Delete artifacts to force recomputation
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerStatusCommand } from './status.js';
import { registerCleanCommand } from './clean.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerStatusCommand(program);
  registerCleanCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'run', description: 'Download, extract, translate and package the configured modpacks' },
    { name: 'status [slugs...]', description: 'Show the artifacts recorded for each modpack' },
    { name: 'clean <slug>', description: 'Delete unit or category artifacts so the next run recomputes them' },
  ];
}
