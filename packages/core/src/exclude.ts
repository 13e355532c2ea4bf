/**
 * Regex exclusion filter for mirror runs.
 *
 * A file is excluded when ANY pattern finds a match anywhere in its path
 * (`RegExp#test`, unanchored). Directories are never tested: they are always
 * traversed and created.
 */

import path from 'path';
import { ConfigurationError, errorMessage } from './errors.js';

/**
 * Compile pattern sources once for the whole run.
 *
 * @throws ConfigurationError naming the first pattern that is not a valid regex
 */
export function compileExclusionPatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(`Invalid exclude pattern "${pattern}": ${errorMessage(error)}`);
    }
  });
}

/**
 * Stateless check, compiling `patterns` on each call. Prefer
 * {@link ExclusionFilter} inside loops.
 */
export function isExcluded(candidate: string, patterns: readonly string[]): boolean {
  return compileExclusionPatterns(patterns).some((regex) => regex.test(candidate));
}

export interface ExclusionFilterOptions {
  patterns?: readonly string[];
  /**
   * Test the absolute source path instead of the path relative to the source
   * root. Patterns then depend on where the source tree lives.
   */
  matchAbsolutePaths?: boolean;
}

/**
 * @example
 * ```ts
 * const filter = new ExclusionFilter({ patterns: ['\\.tmp$', '^cache/'] });
 * filter.isExcluded('/data', '/data/a/file.tmp');   // true
 * filter.isExcluded('/data', '/data/cache/x.bin');  // true
 * filter.isExcluded('/data', '/data/src/cache/x');  // false
 * ```
 */
export class ExclusionFilter {
  private readonly regexes: RegExp[];
  private readonly matchAbsolutePaths: boolean;

  constructor(options: ExclusionFilterOptions = {}) {
    this.regexes = compileExclusionPatterns(options.patterns ?? []);
    this.matchAbsolutePaths = options.matchAbsolutePaths ?? false;
  }

  /** True if any patterns have been configured. */
  get active(): boolean {
    return this.regexes.length > 0;
  }

  /**
   * The string patterns are tested against: the absolute path, or the
   * source-relative path with `/` separators on every platform.
   */
  matchTarget(sourceRoot: string, filePath: string): string {
    if (this.matchAbsolutePaths) {
      return filePath;
    }
    return path.relative(sourceRoot, filePath).split(path.sep).join('/');
  }

  isExcluded(sourceRoot: string, filePath: string): boolean {
    if (!this.active) {
      return false;
    }
    const target = this.matchTarget(sourceRoot, filePath);
    return this.regexes.some((regex) => regex.test(target));
  }
}
