/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input (parsed JSON, CLI strings) and return
 * properly typed values. Values that cannot be coerced are kept so that the
 * validator can report them instead of silently applying a default.
 */

import { ConfigurationError } from '../errors.js';
import { HASH_ALGORITHMS, type HashAlgorithm, type MirrorConfig } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isHashAlgorithm = (value: unknown): value is HashAlgorithm =>
  typeof value === 'string' && (HASH_ALGORITHMS as readonly string[]).includes(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Array Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Regex patterns may legitimately contain commas, so a single string is kept
 * whole rather than split.
 */
export function ensurePatternArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.length > 0);
  }

  if (typeof value === 'string' && value.length > 0) {
    return [value];
  }

  return [];
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Accepts numbers and numeric strings. Anything else that is present becomes
 * NaN so validation rejects it.
 */
export function normalizeNumber(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    return Number(value.trim());
  }
  return Number.NaN;
}

/**
 * Algorithm names are matched exactly: `SHA256` is not `sha256`, and is
 * rejected by validation.
 */
export function normalizeAlgorithm(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Strips surrounding double quotes, as left behind by some shells and
 * Windows shortcuts.
 */
export function stripSurroundingQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, '');
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Normalization
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeMirrorConfig(raw: unknown): MirrorConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Config must be a JSON object');
  }

  const config: MirrorConfig = {};

  const algorithm = normalizeAlgorithm(raw.algorithm);
  if (algorithm !== undefined) config.algorithm = algorithm;

  const blockSize = normalizeNumber(raw.blockSize);
  if (blockSize !== undefined) config.blockSize = blockSize;

  const concurrency = normalizeNumber(raw.concurrency);
  if (concurrency !== undefined) config.concurrency = concurrency;

  const exclude = ensurePatternArray(raw.exclude);
  if (exclude.length) config.exclude = exclude;

  if (typeof raw.matchAbsolutePaths === 'boolean') {
    config.matchAbsolutePaths = raw.matchAbsolutePaths;
  }

  return config;
}

/**
 * Layers `override` on top of `base`. Exclusion patterns accumulate; every
 * other field is replaced when the override defines it.
 */
export function mergeMirrorConfig(base: MirrorConfig, override: MirrorConfig): MirrorConfig {
  const merged: MirrorConfig = { ...base };
  if (override.algorithm !== undefined) merged.algorithm = override.algorithm;
  if (override.blockSize !== undefined) merged.blockSize = override.blockSize;
  if (override.concurrency !== undefined) merged.concurrency = override.concurrency;
  if (override.matchAbsolutePaths !== undefined) merged.matchAbsolutePaths = override.matchAbsolutePaths;
  const exclude = [...(base.exclude ?? []), ...(override.exclude ?? [])];
  if (exclude.length) {
    merged.exclude = exclude;
  }
  return merged;
}
