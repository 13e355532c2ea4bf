/**
 * Timestamp propagation from a source entry to its mirrored destination.
 */

import fs from 'fs/promises';
import { MirrorIOError } from './errors.js';

/**
 * Outcome of the best-effort creation-time step. `unsupported` is a normal
 * result on platforms where birth time cannot be written.
 */
export type CreationTimeOutcome = 'applied' | 'unsupported';

export interface MetadataCopyResult {
  atime: Date;
  mtime: Date;
  creationTime: CreationTimeOutcome;
}

/**
 * Writes a creation time onto `destPath`. Returns false when the platform
 * offers no way to do so.
 */
export type CreationTimeWriter = (destPath: string, birthtime: Date) => Promise<boolean>;

/**
 * Node.js exposes no API for setting birth time on any platform, so the
 * default writer always reports the capability as missing.
 */
export const unsupportedCreationTimeWriter: CreationTimeWriter = async () => false;

/**
 * Copy access and modification times from `sourcePath` to `destPath`, then try
 * to copy the creation time. Works for both files and directories.
 *
 * @throws MirrorIOError if either entry cannot be stat'ed or updated
 */
export async function copyMetadata(
  sourcePath: string,
  destPath: string,
  writeCreationTime: CreationTimeWriter = unsupportedCreationTimeWriter
): Promise<MetadataCopyResult> {
  try {
    const stats = await fs.stat(sourcePath);
    await fs.utimes(destPath, stats.atimeMs / 1000, stats.mtimeMs / 1000);
    const applied = await writeCreationTime(destPath, stats.birthtime);
    return {
      atime: stats.atime,
      mtime: stats.mtime,
      creationTime: applied ? 'applied' : 'unsupported',
    };
  } catch (error) {
    throw new MirrorIOError('metadata', destPath, error);
  }
}
