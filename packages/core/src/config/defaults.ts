/**
 * Default configuration values for hashmirror
 */

import type { HashAlgorithm } from './types.js';

export const DEFAULT_ALGORITHM: HashAlgorithm = 'sha256';
export const DEFAULT_BLOCK_SIZE = 4096;
export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_CONFIG_FILENAME = 'hashmirror.config.json';

/** Read size used when hashing, independent of the copy block size */
export const DIGEST_CHUNK_SIZE = 4096;
