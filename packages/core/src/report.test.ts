import { describe, it, expect } from 'vitest';
import { MirrorStatsCollector, reportHasFailures, summarizeReport } from './report.js';

const BASE = {
  source: '/data/source',
  destination: '/backup/source',
  algorithm: 'sha256' as const,
  dryRun: false,
  startedAt: '2024-01-01T00:00:00.000Z',
  elapsedMs: 1234,
};

describe('MirrorStatsCollector', () => {
  it('accumulates counters into a report', () => {
    const stats = new MirrorStatsCollector();
    stats.recordSeen();
    stats.recordSeen();
    stats.recordSeen();
    stats.recordCopied('create', 10);
    stats.recordCopied('update', 5);
    stats.recordExcluded();
    stats.recordDirectoryCreated();

    const report = stats.toReport(BASE);

    expect(report).toMatchObject({
      totalFiles: 3,
      copiedFiles: 2,
      created: 1,
      updated: 1,
      unchanged: 0,
      excluded: 1,
      directoriesCreated: 1,
      bytesCopied: 15,
      failures: [],
    });
  });

  it('sorts failures by relative path', () => {
    const stats = new MirrorStatsCollector();
    stats.recordFailure({ relativePath: 'b.txt', path: '/b', operation: 'copy', message: 'b' });
    stats.recordFailure({ relativePath: 'a.txt', path: '/a', operation: 'digest', message: 'a' });

    const report = stats.toReport(BASE);

    expect(report.failures.map((failure) => failure.relativePath)).toEqual(['a.txt', 'b.txt']);
    expect(reportHasFailures(report)).toBe(true);
  });
});

describe('summarizeReport', () => {
  it('describes a completed run', () => {
    const stats = new MirrorStatsCollector();
    stats.recordSeen();
    stats.recordSeen();
    stats.recordCopied('create', 1);
    stats.recordUnchanged();

    expect(summarizeReport(stats.toReport(BASE))).toBe(
      'Copied 1/2 files (1 new, 0 updated, 1 unchanged, 0 excluded) in 1.23s'
    );
  });

  it('mentions dry runs and failures', () => {
    const stats = new MirrorStatsCollector();
    stats.recordSeen();
    stats.recordFailure({ relativePath: 'x', path: '/x', operation: 'copy', message: 'boom' });

    expect(summarizeReport(stats.toReport({ ...BASE, dryRun: true, elapsedMs: 0 }))).toBe(
      'Would copy 0/1 files (0 new, 0 updated, 0 unchanged, 0 excluded) in 0.00s; 1 failed'
    );
  });
});
