#!/usr/bin/env node
/**
 * Modpack Localizer CLI
 *
 * Usage:
 *   modpack-localizer run
 *   modpack-localizer run --slug all-the-mods-10 --no-llm
 *   modpack-localizer status
 *   modpack-localizer clean all-the-mods-10 --unit mod/create
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, toGlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('modpack-localizer')
    .description('Localize Minecraft modpacks into a resource pack and a config-overrides bundle')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Config file (default: ./localization.config.json)')
    .option('--root <dir>', 'Directory holding work/ and output/');

  // Store the base command on the program for subcommands to access
  program.hook('preAction', (thisCommand) => {
    const options = toGlobalOptions(thisCommand.opts());
    const baseCommand = new BaseCommand(options);
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (options.verbose && options.quiet) {
      baseCommand.fatal('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program);

  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
