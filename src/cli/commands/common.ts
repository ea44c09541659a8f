/**
 * Helpers shared by the commands.
 *
 * @module cli/commands/common
 */

import { loadAppConfig, type AppConfig, type ConfigOverrides } from '../../config/index.js';
import { errorMessage } from '../../pipeline/errors.js';
import { EXIT_CODES, type BaseCommand } from '../base-command.js';

/**
 * Load the configuration named by the global options, or exit with a
 * usage error listing what is wrong.
 */
export async function loadCommandConfig(
  base: BaseCommand,
  overrides: ConfigOverrides = {}
): Promise<AppConfig> {
  try {
    return await loadAppConfig({
      configPath: base.options.config,
      overrides: { rootDir: base.options.root, ...overrides },
    });
  } catch (error) {
    base.fatal(errorMessage(error), EXIT_CODES.USAGE_ERROR);
  }
}

/**
 * Commander collector for repeatable options.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
