import fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILENAME, mirrorTree, type MirrorReport } from '@hashmirror/core';
import { withErrorHandling } from '../utils/errors.js';
import { exitCodeForReport, setExitCode } from '../utils/exit-codes.js';
import { buildMirrorInput, type MirrorCommandOptions } from '../utils/options.js';
import { ConsoleReporter } from '../utils/reporter.js';

export async function writeReportFile(reportPath: string, report: MirrorReport): Promise<string> {
  const resolved = path.resolve(reportPath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return resolved;
}

/**
 * Registers the default `mirror` command
 */
export function registerMirror(program: Command): void {
  program
    .command('mirror', { isDefault: true })
    .description('Mirror a source directory into a destination, copying only files whose content changed')
    .argument('<source>', 'Directory to read from')
    .argument('<destination>', 'Directory to write into (created if missing)')
    .option('--algorithm <name>', 'Content hash algorithm: sha256 or blake3 (default: sha256)')
    .option('--block-size <bytes>', 'Copy buffer size in bytes (default: 4096)')
    .option('-c, --config <path>', `Load options from a JSON file such as ${DEFAULT_CONFIG_FILENAME}`)
    .option('--dry-run', 'Report what would be copied without writing anything', false)
    .option('--concurrency <n>', 'Number of files copied in parallel (default: 1)')
    .option('--match-absolute', 'Match exclude patterns against absolute paths instead of source-relative ones', false)
    .option('--json', 'Print the run report as JSON', false)
    .option('--report <path>', 'Write the run report as JSON to a file')
    .option('-q, --quiet', 'Only print failures and the summary', false)
    .option('--exclude <patterns...>', 'Regular expressions for files to skip (must come last)')
    .action(
      withErrorHandling(async (source: string, destination: string, options: MirrorCommandOptions) => {
        const input = await buildMirrorInput(source, destination, options);
        const reporter = options.json ? undefined : new ConsoleReporter({ quiet: options.quiet });

        const report = await mirrorTree(input, { reporter });

        if (options.report) {
          const written = await writeReportFile(options.report, report);
          if (!options.json) {
            console.log(chalk.gray(`Report written to ${written}`));
          }
        }

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        }

        setExitCode(exitCodeForReport(report));
      })
    );
}
