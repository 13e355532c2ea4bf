import { ConfigurationError, UnsupportedAlgorithmError, errorMessage } from '../errors.js';
import { DEFAULT_ALGORITHM, DEFAULT_BLOCK_SIZE, DEFAULT_CONCURRENCY } from './defaults.js';
import { isHashAlgorithm } from './normalizer.js';
import type { ConfigValidationIssue, MirrorOptions, MirrorOptionsInput } from './types.js';

const MAX_CONCURRENCY = 64;

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
  }
}

function validatePositiveInteger(
  field: string,
  value: number | undefined,
  issues: ConfigValidationIssue[],
  max?: number
) {
  if (value === undefined) {
    return;
  }
  if (!Number.isInteger(value) || value <= 0) {
    issues.push({ field, message: 'must be a positive integer' });
    return;
  }
  if (max !== undefined && value > max) {
    issues.push({ field, message: `must not exceed ${max}` });
  }
}

function validatePattern(field: string, pattern: string, issues: ConfigValidationIssue[]) {
  try {
    new RegExp(pattern);
  } catch (error) {
    issues.push({ field, message: `is not a valid regular expression (${errorMessage(error)})` });
  }
}

export function validateMirrorOptions(input: MirrorOptionsInput): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validatePathLike('source', input.source, issues);
  validatePathLike('destination', input.destination, issues);

  if (input.algorithm !== undefined && !isHashAlgorithm(input.algorithm)) {
    issues.push({ field: 'algorithm', message: `unsupported algorithm "${input.algorithm}" (expected sha256 or blake3)` });
  }

  validatePositiveInteger('blockSize', input.blockSize, issues);
  validatePositiveInteger('concurrency', input.concurrency, issues, MAX_CONCURRENCY);

  (input.exclude ?? []).forEach((pattern, index) => {
    validatePattern(`exclude[${index}]`, pattern, issues);
  });

  return issues;
}

/**
 * Applies defaults and validates. An unknown algorithm is reported on its own
 * as an UnsupportedAlgorithmError; every other problem is collected into one
 * ConfigurationError.
 */
export function resolveMirrorOptions(input: MirrorOptionsInput): MirrorOptions {
  if (input.algorithm !== undefined && !isHashAlgorithm(input.algorithm)) {
    throw new UnsupportedAlgorithmError(input.algorithm);
  }

  const issues = validateMirrorOptions(input);
  if (issues.length) {
    const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
    throw new ConfigurationError(`Invalid hashmirror configuration:\n${details}`);
  }

  return {
    source: input.source,
    destination: input.destination,
    algorithm: isHashAlgorithm(input.algorithm) ? input.algorithm : DEFAULT_ALGORITHM,
    blockSize: input.blockSize ?? DEFAULT_BLOCK_SIZE,
    exclude: input.exclude ?? [],
    concurrency: input.concurrency ?? DEFAULT_CONCURRENCY,
    matchAbsolutePaths: input.matchAbsolutePaths ?? false,
    dryRun: input.dryRun ?? false,
  };
}
