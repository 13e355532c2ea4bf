/**
 * Configuration module for hashmirror
 *
 * This module handles loading, normalizing and validating run options.
 */

export { HASH_ALGORITHMS } from './types.js';
export type {
  HashAlgorithm,
  MirrorConfig,
  MirrorOptions,
  MirrorOptionsInput,
  ConfigValidationIssue,
} from './types.js';

export {
  DEFAULT_ALGORITHM,
  DEFAULT_BLOCK_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_CONFIG_FILENAME,
  DIGEST_CHUNK_SIZE,
} from './defaults.js';

export {
  isHashAlgorithm,
  ensurePatternArray,
  normalizeNumber,
  normalizeAlgorithm,
  stripSurroundingQuotes,
  normalizeMirrorConfig,
  mergeMirrorConfig,
} from './normalizer.js';

export { validateMirrorOptions, resolveMirrorOptions } from './validator.js';

export { loadMirrorConfig, type LoadConfigResult } from './loader.js';
