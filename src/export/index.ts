/**
 * Export Module
 *
 * Deterministic archive building and the localization packager.
 *
 * @module export
 */

export {
  createZipBuffer,
  formatFileSize,
  FIXED_ENTRY_DATE,
  type ZipFileEntry,
  type ZipOptions,
} from './zip.js';

export {
  ArchivePackager,
  createPackMcmeta,
  resourcePackNamespace,
  type PackagerSettings,
} from './packager.js';
