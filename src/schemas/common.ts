/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// Timestamps
// ============================================

/**
 * ISO8601 timestamp with timezone offset.
 */
export const ISO8601TimestampSchema = z.string().datetime({ offset: true });

// ============================================
// Identifiers
// ============================================

/**
 * Path segments that would escape the work tree.
 */
const PATH_TRAVERSAL_PATTERN = /(\.\.|[/\\])/;

/**
 * Modpack slug as used by CurseForge (e.g. "all-the-mods-10").
 * Slugs become directory names, so separators and dot-dot are rejected.
 */
export const SlugSchema = z
  .string()
  .min(1, 'Slug must not be empty')
  .refine((value) => !PATH_TRAVERSAL_PATTERN.test(value), {
    message: 'Slug contains invalid characters (path traversal not allowed)',
  });

/**
 * SHA-256 hex digest.
 */
export const Sha256Schema = z.string().regex(/^[a-f0-9]{64}$/, 'Expected a SHA-256 hex digest');
