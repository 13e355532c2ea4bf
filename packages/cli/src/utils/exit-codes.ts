/**
 * Exit Code Reference for the hashmirror CLI
 *
 * | Code | Meaning                                              |
 * |------|------------------------------------------------------|
 * | 0    | Mirror completed, every file accounted for           |
 * | 1    | Unexpected error                                     |
 * | 2    | Configuration error (flags, config file, arguments)  |
 * | 3    | Source directory missing or not a directory          |
 * | 4    | Run completed but one or more files failed           |
 *
 * ## Usage in scripts
 *
 * ```bash
 * hashmirror /data/photos /mnt/backup/photos --quiet
 * case $? in
 *   0) echo "Backup current" ;;
 *   4) echo "Some files failed; rerun to converge" ;;
 *   *) echo "Backup did not run" ;;
 * esac
 * ```
 */

import type { MirrorReport } from '@hashmirror/core';

export const MIRROR_EXIT_CODES = {
  /** Success - every file copied, unchanged or excluded */
  SUCCESS: 0,
  /** General error (catch-all for exceptions) */
  ERROR: 1,
  /** Invalid flags, config file or missing arguments */
  CONFIGURATION: 2,
  /** Source directory does not exist */
  SOURCE_NOT_FOUND: 3,
  /** Some files could not be mirrored */
  PARTIAL_FAILURE: 4,
} as const;

export type MirrorExitCode = (typeof MIRROR_EXIT_CODES)[keyof typeof MIRROR_EXIT_CODES];

export const MIRROR_EXIT_DESCRIPTIONS: Record<MirrorExitCode, string> = {
  [MIRROR_EXIT_CODES.SUCCESS]: 'Success',
  [MIRROR_EXIT_CODES.ERROR]: 'General error',
  [MIRROR_EXIT_CODES.CONFIGURATION]: 'Configuration error',
  [MIRROR_EXIT_CODES.SOURCE_NOT_FOUND]: 'Source directory not found',
  [MIRROR_EXIT_CODES.PARTIAL_FAILURE]: 'One or more files failed to mirror',
};

const isMirrorExitCode = (code: number): code is MirrorExitCode => code in MIRROR_EXIT_DESCRIPTIONS;

/**
 * Get a human-readable description for an exit code.
 */
export function getExitCodeDescription(code: number): string {
  return isMirrorExitCode(code) ? MIRROR_EXIT_DESCRIPTIONS[code] : `Unknown exit code: ${code}`;
}

export function exitCodeForReport(report: MirrorReport): MirrorExitCode {
  return report.failures.length ? MIRROR_EXIT_CODES.PARTIAL_FAILURE : MIRROR_EXIT_CODES.SUCCESS;
}

/**
 * Sets the process exit code. With `DEBUG=hashmirror` the reason is echoed
 * to stderr.
 */
export function setExitCode(code: MirrorExitCode, options?: { silent?: boolean }): void {
  process.exitCode = code;
  if (!options?.silent && code !== MIRROR_EXIT_CODES.SUCCESS && process.env.DEBUG?.includes('hashmirror')) {
    console.error(`[hashmirror] Exit code ${code}: ${getExitCodeDescription(code)}`);
  }
}
