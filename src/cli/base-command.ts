/**
 * Base Command
 *
 * Common functionality for all CLI commands:
 * - Global option handling (verbose, quiet, no-color)
 * - Exit codes
 * - Output utilities; doubles as the pipeline Logger
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command, OptionValues } from 'commander';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Config file path */
  config?: string;
  /** Project root holding work/ and output/ */
  root?: string;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read the global flags out of commander's option values.
 */
export function toGlobalOptions(values: OptionValues): GlobalOptions {
  return {
    verbose: values['verbose'] === true,
    quiet: values['quiet'] === true,
    color: values['color'] !== false,
    config: optionalString(values['config']),
    root: optionalString(values['root']),
  };
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** At least one modpack failed, or a general error */
  ERROR: 1,
  /** Invalid usage, arguments or configuration */
  USAGE_ERROR: 2,
  /** Nothing recorded for the requested modpack or unit */
  NOT_FOUND: 3,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * Implements the pipeline Logger, so a command hands itself to the
 * executor and every stage message honors --verbose and --quiet.
 *
 * @example
 * ```typescript
 * async function statusHandler(slugs: string[], options: StatusOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd);
 *   base.section('Status');
 *   base.keyValue('Units', units.length);
 * }
 * ```
 */
export class BaseCommand implements Logger {
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Logger
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible). Does not exit.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Print an error and exit.
   *
   * @param errorOrCode - Error object (stack shown in verbose mode) or exit code
   */
  fatal(message: string, errorOrCode?: unknown): never {
    this.error(message);

    if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    }
    if (errorOrCode instanceof Error && this.options.verbose) {
      console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
    }
    process.exit(EXIT_CODES.ERROR);
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X (always visible).
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print text as-is (always visible). Used for summaries.
   */
  print(text: string): void {
    console.log(text);
  }

  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored on the root program by the preAction hook.
 * Falls back to a default instance (for testing).
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  const base: unknown = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand(toGlobalOptions(cmd.optsWithGlobals()));
  }
  return base;
}
