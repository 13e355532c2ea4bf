/**
 * Configuration types for hashmirror
 */

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Types
// ─────────────────────────────────────────────────────────────────────────────

export const HASH_ALGORITHMS = ['sha256', 'blake3'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Config File Shape
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shape of a `hashmirror.config.json` file. Every field is optional; CLI flags
 * take precedence over file values.
 */
export interface MirrorConfig {
  /** Checked against HASH_ALGORITHMS when options are resolved */
  algorithm?: string;
  /** Copy transfer chunk size in bytes */
  blockSize?: number;
  /** Regular expressions; a file whose path matches any of them is skipped */
  exclude?: string[];
  /** Upper bound on concurrent file copies. 1 keeps the run sequential. */
  concurrency?: number;
  /** Test exclusion patterns against absolute source paths instead of source-relative ones */
  matchAbsolutePaths?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolved Run Options
// ─────────────────────────────────────────────────────────────────────────────

export interface MirrorOptions {
  source: string;
  destination: string;
  algorithm: HashAlgorithm;
  blockSize: number;
  exclude: string[];
  concurrency: number;
  matchAbsolutePaths: boolean;
  /** Decide everything, change nothing */
  dryRun: boolean;
}

/**
 * Unvalidated run options as assembled from CLI flags and a config file.
 */
export interface MirrorOptionsInput extends MirrorConfig {
  source: string;
  destination: string;
  dryRun?: boolean;
}

export interface ConfigValidationIssue {
  field: string;
  message: string;
}
