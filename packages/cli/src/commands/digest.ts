import { Command } from 'commander';
import {
  DEFAULT_ALGORITHM,
  computeDigest,
  normalizeAlgorithm,
  stripSurroundingQuotes,
} from '@hashmirror/core';
import { withErrorHandling } from '../utils/errors.js';

/**
 * Registers `digest`, which prints a single file's content hash in the same
 * form the mirror uses for comparison.
 */
export function registerDigest(program: Command): void {
  program
    .command('digest')
    .description('Print the content digest of a file')
    .argument('<file>', 'File to hash')
    .option('--algorithm <name>', 'Content hash algorithm: sha256 or blake3 (default: sha256)')
    .action(
      withErrorHandling(async (file: string, options: { algorithm?: string }) => {
        const filePath = stripSurroundingQuotes(file);
        const algorithm = normalizeAlgorithm(options.algorithm) ?? DEFAULT_ALGORITHM;
        const digest = await computeDigest(filePath, algorithm);
        console.log(`${digest}  ${filePath}`);
      })
    );
}
