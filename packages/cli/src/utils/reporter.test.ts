import { afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import chalk from 'chalk';
import type { FileDecision, MirrorReport } from '@hashmirror/core';
import { ConsoleReporter } from './reporter.js';

const decision = (relativePath: string, action: FileDecision['action']): FileDecision => ({
  relativePath,
  sourcePath: `/src/${relativePath}`,
  destinationPath: `/dst/${relativePath}`,
  action,
});

const START = { source: '/src', destination: '/dst', algorithm: 'sha256' as const, exclude: [], dryRun: false };

const METADATA = { atime: new Date(0), mtime: new Date(0), creationTime: 'unsupported' as const };

describe('ConsoleReporter', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const logged = () => logSpy.mock.calls.map((call) => String(call[0]));

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints a header and one line per file', () => {
    const reporter = new ConsoleReporter();

    reporter.onStart({ ...START, exclude: ['\\.tmp$'] });
    reporter.onDirectoryCreated('');
    reporter.onDirectoryCreated('a');
    reporter.onFileExcluded(decision('a/skip.tmp', 'excluded'));
    reporter.onFileUnchanged(decision('a/same.txt', 'unchanged'));
    reporter.onFileCopied(decision('a/new.txt', 'create'), { bytesCopied: 12, metadata: METADATA });
    reporter.onFileCopied(decision('a/old.txt', 'update'), { bytesCopied: 3, metadata: METADATA });

    expect(logged()).toEqual([
      'Mirroring /src → /dst (sha256)',
      'Excluding: \\.tmp$',
      '  mkdir     a/',
      '  excluded  a/skip.tmp',
      '  unchanged a/same.txt',
      '  new       a/new.txt (12 bytes)',
      '  updated   a/old.txt (3 bytes)',
    ]);
  });

  it('announces dry runs and omits byte counts', () => {
    const reporter = new ConsoleReporter();

    reporter.onStart({ ...START, dryRun: true });
    reporter.onFileCopied(decision('b.txt', 'create'));

    expect(logged()).toEqual([
      'Mirroring /src → /dst (sha256)',
      'Dry run: nothing will be written',
      '  new       b.txt',
    ]);
  });

  it('keeps failures and the summary in quiet mode', () => {
    const reporter = new ConsoleReporter({ quiet: true });
    const report: MirrorReport = {
      source: '/src',
      destination: '/dst',
      algorithm: 'sha256',
      dryRun: false,
      startedAt: '2024-01-01T00:00:00.000Z',
      totalFiles: 2,
      copiedFiles: 1,
      created: 1,
      updated: 0,
      unchanged: 0,
      excluded: 0,
      directoriesCreated: 0,
      bytesCopied: 5,
      failures: [{ relativePath: 'bad.txt', path: '/src/bad.txt', operation: 'copy', message: 'denied' }],
      elapsedMs: 500,
    };

    reporter.onStart(START);
    reporter.onFileCopied(decision('ok.txt', 'create'), { bytesCopied: 5, metadata: METADATA });
    reporter.onFileFailed(report.failures[0]);
    reporter.onComplete(report);

    expect(logged()).toEqual([
      'Mirroring /src → /dst (sha256)',
      'Copied 1/2 files (1 new, 0 updated, 0 unchanged, 0 excluded) in 0.50s; 1 failed',
    ]);
    expect(errorSpy).toHaveBeenCalledWith('  failed    bad.txt: denied');
  });
});
