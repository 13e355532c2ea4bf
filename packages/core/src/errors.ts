/**
 * Error types raised by the mirror engine.
 *
 * Every error carries a stable `code` so the CLI can map it to an exit code
 * without matching on messages.
 */

export type MirrorErrorCode = 'CONFIGURATION' | 'SOURCE_NOT_FOUND' | 'IO';

export type IoOperation = 'walk' | 'digest' | 'copy' | 'metadata' | 'mkdir';

export class MirrorError extends Error {
  constructor(message: string, public readonly code: MirrorErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MirrorError';
  }
}

export class ConfigurationError extends MirrorError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedAlgorithmError extends ConfigurationError {
  constructor(public readonly algorithm: string) {
    super(`Unsupported algorithm: ${algorithm}`);
    this.name = 'UnsupportedAlgorithmError';
  }
}

export class SourceNotFoundError extends MirrorError {
  constructor(public readonly sourcePath: string, options?: { cause?: unknown }) {
    super(`Source directory does not exist or is not a directory: ${sourcePath}`, 'SOURCE_NOT_FOUND', options);
    this.name = 'SourceNotFoundError';
  }
}

export class MirrorIOError extends MirrorError {
  /** errno code of the underlying failure (ENOENT, EACCES, ENOSPC, ...) */
  public readonly errno?: string;

  constructor(
    public readonly operation: IoOperation,
    public readonly path: string,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${errorMessage(cause)}`, 'IO', { cause });
    this.name = 'MirrorIOError';
    this.errno = errnoOf(cause);
  }
}

export function isMirrorError(error: unknown): error is MirrorError {
  return error instanceof MirrorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** errno code (`ENOENT`, `EACCES`, ...) of a Node.js system error */
export function errnoOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
