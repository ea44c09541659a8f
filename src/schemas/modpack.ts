/**
 * Modpack Metadata Schema
 *
 * Describes the modpack file a Download produced. Saved beside the raw
 * archive and copied to the output directory after packaging.
 *
 * @module schemas/modpack
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema, SlugSchema } from './common.js';

export const ModpackInfoSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.modpackInfo),
  slug: SlugSchema,
  name: z.string(),
  version: z.string(),
  /** CurseForge project id */
  projectId: z.number().int().nonnegative(),
  /** CurseForge file id of the downloaded archive */
  fileId: z.number().int().nonnegative(),
  fileName: z.string(),
  mcVersion: z.string(),
  downloadedAt: ISO8601TimestampSchema,
});

export type ModpackInfo = z.infer<typeof ModpackInfoSchema>;

/**
 * One mod file referenced by a CurseForge modpack manifest.
 */
export const ManifestFileSchema = z.object({
  projectID: z.number().int(),
  fileID: z.number().int(),
  required: z.boolean().default(true),
});

export type ManifestFile = z.infer<typeof ManifestFileSchema>;

/**
 * manifest.json at the root of a CurseForge modpack archive.
 * Only the fields the installer reads are declared.
 */
export const CurseForgeManifestSchema = z.object({
  minecraft: z.object({
    version: z.string(),
  }),
  name: z.string().default(''),
  version: z.string().default(''),
  files: z.array(ManifestFileSchema).default([]),
  overrides: z.string().default('overrides'),
});

export type CurseForgeManifest = z.infer<typeof CurseForgeManifestSchema>;
