import chalk from 'chalk';
import {
  summarizeReport,
  type FailureRecord,
  type FileCopyResult,
  type FileDecision,
  type MirrorReport,
  type MirrorReporter,
  type MirrorStartEvent,
} from '@hashmirror/core';

export interface ConsoleReporterOptions {
  /** Hide per-file lines; failures and the summary are still printed */
  quiet?: boolean;
}

const LABEL_WIDTH = 10;

const label = (text: string) => text.padEnd(LABEL_WIDTH);

/**
 * Renders mirror progress to the console.
 */
export class ConsoleReporter implements MirrorReporter {
  private readonly quiet: boolean;
  private dryRun = false;

  constructor(options: ConsoleReporterOptions = {}) {
    this.quiet = options.quiet ?? false;
  }

  onStart(event: MirrorStartEvent): void {
    this.dryRun = event.dryRun;
    console.log(chalk.blue(`Mirroring ${event.source} → ${event.destination} (${event.algorithm})`));
    if (event.exclude.length) {
      console.log(chalk.gray(`Excluding: ${event.exclude.join(', ')}`));
    }
    if (event.dryRun) {
      console.log(chalk.yellow('Dry run: nothing will be written'));
    }
  }

  onDirectoryCreated(relativePath: string): void {
    // The destination root itself is implied by the header.
    if (this.quiet || !relativePath) return;
    console.log(chalk.gray(`  ${label('mkdir')}${relativePath}/`));
  }

  onFileExcluded(decision: FileDecision): void {
    if (this.quiet) return;
    console.log(chalk.yellow(`  ${label('excluded')}${decision.relativePath}`));
  }

  onFileUnchanged(decision: FileDecision): void {
    if (this.quiet) return;
    console.log(chalk.gray(`  ${label('unchanged')}${decision.relativePath}`));
  }

  onFileCopied(decision: FileDecision, result?: FileCopyResult): void {
    if (this.quiet) return;
    const action = decision.action === 'create' ? 'new' : 'updated';
    if (this.dryRun || !result) {
      console.log(chalk.yellow(`  ${label(action)}${decision.relativePath}`));
      return;
    }
    console.log(chalk.green(`  ${label(action)}${decision.relativePath}`) + chalk.gray(` (${result.bytesCopied} bytes)`));
  }

  onFileFailed(failure: FailureRecord): void {
    console.error(chalk.red(`  ${label('failed')}${failure.relativePath}: ${failure.message}`));
  }

  onComplete(report: MirrorReport): void {
    const summary = summarizeReport(report);
    console.log(report.failures.length ? chalk.red(summary) : chalk.green(summary));
  }
}
