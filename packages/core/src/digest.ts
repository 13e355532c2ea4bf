/**
 * Content digests used for change detection.
 *
 * Files are read in fixed DIGEST_CHUNK_SIZE chunks and fed into an incremental
 * hasher, so memory use does not depend on file size or on the copy block size.
 */

import crypto from 'crypto';
import fs, { type FileHandle } from 'fs/promises';
import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';
import { DIGEST_CHUNK_SIZE } from './config/defaults.js';
import { isHashAlgorithm } from './config/normalizer.js';
import type { HashAlgorithm } from './config/types.js';
import { MirrorIOError, UnsupportedAlgorithmError } from './errors.js';
import { closeAll } from './handles.js';

export interface IncrementalHasher {
  update(chunk: Uint8Array): void;
  /** Lowercase hex; the hasher must not be used afterwards */
  digestHex(): string;
}

export function createHasher(algorithm: string): IncrementalHasher {
  if (!isHashAlgorithm(algorithm)) {
    throw new UnsupportedAlgorithmError(algorithm);
  }
  return HASHER_FACTORIES[algorithm]();
}

const HASHER_FACTORIES: Record<HashAlgorithm, () => IncrementalHasher> = {
  sha256: () => {
    const hash = crypto.createHash('sha256');
    return {
      update: (chunk) => {
        hash.update(chunk);
      },
      digestHex: () => hash.digest('hex'),
    };
  },
  blake3: () => {
    const hash = blake3.create({});
    return {
      update: (chunk) => {
        hash.update(chunk);
      },
      digestHex: () => bytesToHex(hash.digest()),
    };
  },
};

/**
 * Compute the digest of a file's contents.
 *
 * @throws UnsupportedAlgorithmError before touching the file
 * @throws MirrorIOError when the file cannot be opened or read
 */
export async function computeDigest(filePath: string, algorithm: string): Promise<string> {
  const hasher = createHasher(algorithm);

  let handle: FileHandle | undefined;
  let failure: { cause: unknown } | undefined;
  try {
    handle = await fs.open(filePath, 'r');
    const buffer = Buffer.alloc(DIGEST_CHUNK_SIZE);
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, DIGEST_CHUNK_SIZE, null);
      if (bytesRead === 0) break;
      hasher.update(buffer.subarray(0, bytesRead));
    }
  } catch (error) {
    failure = { cause: error };
  }

  const closeFailure = await closeAll([handle]);
  const firstFailure = failure ?? closeFailure;
  if (firstFailure) {
    throw new MirrorIOError('digest', filePath, firstFailure.cause);
  }

  return hasher.digestHex();
}

/**
 * Digest an in-memory buffer with the same algorithms as {@link computeDigest}.
 */
export function digestBytes(bytes: Uint8Array, algorithm: string): string {
  const hasher = createHasher(algorithm);
  hasher.update(bytes);
  return hasher.digestHex();
}
