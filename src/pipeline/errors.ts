/**
 * Pipeline Error Taxonomy
 *
 * | Error              | Scope                  | Effect                                   |
 * |--------------------|------------------------|------------------------------------------|
 * | DownloadError      | modpack                | modpack aborted, no units resolvable     |
 * | ExtractionError    | category of a modpack  | other categories still extract           |
 * | TranslationError   | unit                   | unit passes English through, retried     |
 * | PackageError       | modpack                | no usable package for the modpack        |
 *
 * None of these ever affects another configured modpack.
 *
 * @module pipeline/errors
 */

import type { UnitCategory } from '../schemas/unit.js';
import type { StageName } from './types.js';

/**
 * Base class of all pipeline failures.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: StageName,
    public readonly slug: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }

  /** Whether the failure ends the modpack's pipeline */
  get isFatal(): boolean {
    return true;
  }
}

/**
 * Network, auth or install failure while fetching a modpack.
 */
export class DownloadError extends PipelineError {
  constructor(slug: string, message: string, options?: ErrorOptions) {
    super(message, 'download', slug, options);
    this.name = 'DownloadError';
  }
}

/**
 * Failure of one category's extractor.
 */
export class ExtractionError extends PipelineError {
  constructor(
    slug: string,
    public readonly category: UnitCategory,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, 'extract', slug, options);
    this.name = 'ExtractionError';
  }
}

/**
 * Failure to translate one unit (e.g. LLM retries exhausted or timed out).
 */
export class TranslationError extends PipelineError {
  constructor(
    slug: string,
    public readonly unitId: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, 'translate', slug, options);
    this.name = 'TranslationError';
  }

  override get isFatal(): boolean {
    return false;
  }
}

/**
 * Failure to build or write a package archive.
 */
export class PackageError extends PipelineError {
  constructor(slug: string, message: string, options?: ErrorOptions) {
    super(message, 'package', slug, options);
    this.name = 'PackageError';
  }
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
