/**
 * Run statistics and reporting hooks for mirror runs.
 */

import type { HashAlgorithm } from './config/types.js';
import type { FileCopyResult } from './copy-file.js';
import type { IoOperation, MirrorIOError } from './errors.js';

export type FileAction = 'create' | 'update' | 'unchanged' | 'excluded' | 'failed';

export interface FileDecision {
  relativePath: string;
  sourcePath: string;
  destinationPath: string;
  action: FileAction;
  sourceDigest?: string;
  destinationDigest?: string;
  error?: MirrorIOError;
}

export interface FailureRecord {
  relativePath: string;
  path: string;
  operation: IoOperation;
  message: string;
  errno?: string;
}

export interface MirrorReport {
  source: string;
  destination: string;
  algorithm: HashAlgorithm;
  dryRun: boolean;
  startedAt: string;
  /** Every file seen during the walk, excluded ones included */
  totalFiles: number;
  /** created + updated */
  copiedFiles: number;
  created: number;
  updated: number;
  unchanged: number;
  excluded: number;
  directoriesCreated: number;
  bytesCopied: number;
  failures: FailureRecord[];
  elapsedMs: number;
}

export interface MirrorStartEvent {
  source: string;
  destination: string;
  algorithm: HashAlgorithm;
  exclude: string[];
  dryRun: boolean;
}

/**
 * Optional callbacks fired while a run progresses. The engine itself never
 * writes to the console; the CLI renders these.
 */
export interface MirrorReporter {
  onStart?(event: MirrorStartEvent): void;
  onDirectoryCreated?(relativePath: string, destinationPath: string): void;
  onFileExcluded?(decision: FileDecision): void;
  onFileUnchanged?(decision: FileDecision): void;
  /** `result` is absent in dry runs */
  onFileCopied?(decision: FileDecision, result?: FileCopyResult): void;
  onFileFailed?(failure: FailureRecord): void;
  onComplete?(report: MirrorReport): void;
}

export function failureFromError(relativePath: string, error: MirrorIOError): FailureRecord {
  return {
    relativePath,
    path: error.path,
    operation: error.operation,
    message: error.message,
    errno: error.errno,
  };
}

/**
 * Accumulates counters for one run. Counters only ever grow.
 */
export class MirrorStatsCollector {
  private totalFiles = 0;
  private created = 0;
  private updated = 0;
  private unchanged = 0;
  private excluded = 0;
  private directoriesCreated = 0;
  private bytesCopied = 0;
  private failures: FailureRecord[] = [];

  recordSeen(): void {
    this.totalFiles++;
  }

  recordExcluded(): void {
    this.excluded++;
  }

  recordUnchanged(): void {
    this.unchanged++;
  }

  recordCopied(action: 'create' | 'update', bytes = 0): void {
    if (action === 'create') {
      this.created++;
    } else {
      this.updated++;
    }
    this.bytesCopied += bytes;
  }

  recordDirectoryCreated(): void {
    this.directoriesCreated++;
  }

  recordFailure(failure: FailureRecord): void {
    this.failures.push(failure);
  }

  toReport(base: Pick<MirrorReport, 'source' | 'destination' | 'algorithm' | 'dryRun' | 'startedAt' | 'elapsedMs'>): MirrorReport {
    return {
      ...base,
      totalFiles: this.totalFiles,
      copiedFiles: this.created + this.updated,
      created: this.created,
      updated: this.updated,
      unchanged: this.unchanged,
      excluded: this.excluded,
      directoriesCreated: this.directoriesCreated,
      bytesCopied: this.bytesCopied,
      failures: [...this.failures].sort((a, b) => a.relativePath.localeCompare(b.relativePath)),
    };
  }
}

export function reportHasFailures(report: MirrorReport): boolean {
  return report.failures.length > 0;
}

/**
 * One-line, human-readable summary of a run.
 *
 * @example "Copied 2/3 files (2 new, 0 updated, 1 unchanged, 0 excluded) in 0.04s"
 */
export function summarizeReport(report: MirrorReport): string {
  const verb = report.dryRun ? 'Would copy' : 'Copied';
  const seconds = (report.elapsedMs / 1000).toFixed(2);
  let summary =
    `${verb} ${report.copiedFiles}/${report.totalFiles} files ` +
    `(${report.created} new, ${report.updated} updated, ${report.unchanged} unchanged, ${report.excluded} excluded) ` +
    `in ${seconds}s`;
  if (report.failures.length) {
    summary += `; ${report.failures.length} failed`;
  }
  return summary;
}
