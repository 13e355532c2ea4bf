import fs, { type FileHandle } from 'fs/promises';
import { ConfigurationError, MirrorIOError } from './errors.js';
import { closeAll } from './handles.js';
import {
  copyMetadata,
  unsupportedCreationTimeWriter,
  type CreationTimeWriter,
  type MetadataCopyResult,
} from './metadata.js';

export interface FileCopyResult {
  bytesCopied: number;
  metadata: MetadataCopyResult;
}

export function assertValidBlockSize(blockSize: number): void {
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new ConfigurationError(`Block size must be a positive integer, got ${blockSize}`);
  }
}

/**
 * Copy `sourcePath` over `destPath` (created or truncated) in sequential
 * chunks of at most `blockSize` bytes, then copy timestamps.
 *
 * @throws ConfigurationError for a non-positive block size, before any I/O
 * @throws MirrorIOError when reading, writing or stamping fails
 */
export async function copyFileInBlocks(
  sourcePath: string,
  destPath: string,
  blockSize: number,
  writeCreationTime: CreationTimeWriter = unsupportedCreationTimeWriter
): Promise<FileCopyResult> {
  assertValidBlockSize(blockSize);

  let source: FileHandle | undefined;
  let destination: FileHandle | undefined;
  let bytesCopied = 0;
  let failure: { cause: unknown } | undefined;

  try {
    source = await fs.open(sourcePath, 'r');
    destination = await fs.open(destPath, 'w');
    const buffer = Buffer.alloc(blockSize);
    for (;;) {
      const { bytesRead } = await source.read(buffer, 0, blockSize, null);
      if (bytesRead === 0) break;
      let offset = 0;
      while (offset < bytesRead) {
        const { bytesWritten } = await destination.write(buffer, offset, bytesRead - offset, null);
        offset += bytesWritten;
      }
      bytesCopied += bytesRead;
    }
  } catch (error) {
    failure = { cause: error };
  }

  // Both handles are closed before reporting; a close failure fails the copy.
  const closeFailure = await closeAll([source, destination]);
  const firstFailure = failure ?? closeFailure;
  if (firstFailure) {
    throw new MirrorIOError('copy', sourcePath, firstFailure.cause);
  }

  // Timestamps go on after the handles are closed; closing a written file can
  // bump its mtime on some filesystems.
  const metadata = await copyMetadata(sourcePath, destPath, writeCreationTime);
  return { bytesCopied, metadata };
}
