/**
 * Mirror orchestrator.
 *
 * A run has two phases:
 *   1. plan    - walk the source tree, create missing destination directories,
 *                and decide per file whether it must be copied
 *   2. execute - copy the files that were decided `create` or `update`
 *
 * The copy decision compares content digests, never timestamps: a touched but
 * unchanged file is left alone, and every changed file is caught at the cost
 * of hashing each existing destination file on every run.
 */

import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { performance } from 'perf_hooks';
import pLimit from 'p-limit';
import { resolveMirrorOptions } from './config/validator.js';
import type { MirrorOptions, MirrorOptionsInput } from './config/types.js';
import { copyFileInBlocks } from './copy-file.js';
import { computeDigest } from './digest.js';
import { ConfigurationError, MirrorIOError, SourceNotFoundError, errnoOf } from './errors.js';
import { ExclusionFilter } from './exclude.js';
import { copyMetadata, unsupportedCreationTimeWriter, type CreationTimeWriter } from './metadata.js';
import {
  failureFromError,
  MirrorStatsCollector,
  type FileDecision,
  type MirrorReport,
  type MirrorReporter,
} from './report.js';
import { walkSourceTree, type DirectoryLister, type DirectoryVisit } from './walker.js';

export interface MirrorEngineOptions {
  reporter?: MirrorReporter;
  /** Defaults to a writer that reports creation time as unsupported */
  writeCreationTime?: CreationTimeWriter;
  /** Defaults to listing through fast-glob */
  listDirectory?: DirectoryLister;
}

export interface MirrorPlan {
  options: MirrorOptions;
  sourceRoot: string;
  destinationRoot: string;
  decisions: FileDecision[];
}

interface RunContext {
  options: MirrorOptions;
  sourceRoot: string;
  destinationRoot: string;
  reporter: MirrorReporter;
  writeCreationTime: CreationTimeWriter;
  listDirectory?: DirectoryLister;
  stats: MirrorStatsCollector;
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

async function assertSourceDirectory(sourceRoot: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(sourceRoot);
  } catch (error) {
    throw new SourceNotFoundError(sourceRoot, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new SourceNotFoundError(sourceRoot);
  }
}

function assertDisjointRoots(sourceRoot: string, destinationRoot: string): void {
  const relative = path.relative(sourceRoot, destinationRoot);
  if (relative === '') {
    throw new ConfigurationError('Source and destination must be different directories');
  }
  const outside = relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
  if (!outside) {
    throw new ConfigurationError(`Destination ${destinationRoot} must not be inside source ${sourceRoot}`);
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (errnoOf(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Destination Directories
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Idempotent "create if absent" keyed by destination path. A directory is
 * stamped with its source's timestamps only when this run created it.
 */
class DestinationDirectories {
  private readonly known = new Map<string, MirrorIOError | null>();
  private readonly created: Array<{ relativePath: string; sourceDir: string; destinationDir: string }> = [];

  constructor(private readonly context: RunContext) {}

  /** Returns the error that prevented the directory from existing, if any */
  async ensure(relativePath: string, sourceDir: string, destinationDir: string): Promise<MirrorIOError | null> {
    const cached = this.known.get(destinationDir);
    if (cached !== undefined) {
      return cached;
    }

    const outcome = await this.create(relativePath, sourceDir, destinationDir);
    this.known.set(destinationDir, outcome);
    return outcome;
  }

  private async create(relativePath: string, sourceDir: string, destinationDir: string): Promise<MirrorIOError | null> {
    const { options, reporter, stats } = this.context;

    try {
      const existing = await fs.stat(destinationDir);
      if (existing.isDirectory()) {
        return null;
      }
      return new MirrorIOError('mkdir', destinationDir, new Error('a non-directory entry is in the way'));
    } catch (error) {
      if (errnoOf(error) !== 'ENOENT') {
        return new MirrorIOError('mkdir', destinationDir, error);
      }
    }

    if (!options.dryRun) {
      try {
        await fs.mkdir(destinationDir, { recursive: true });
      } catch (error) {
        return new MirrorIOError('mkdir', destinationDir, error);
      }
      await this.stamp(relativePath, sourceDir, destinationDir);
      this.created.push({ relativePath, sourceDir, destinationDir });
    }

    stats.recordDirectoryCreated();
    reporter.onDirectoryCreated?.(relativePath, destinationDir);
    return null;
  }

  /**
   * Writing files into a directory moves its mtime, so directories created by
   * this run are stamped again once their contents are in place, deepest first.
   */
  async restampCreated(): Promise<void> {
    for (const entry of [...this.created].reverse()) {
      await this.stamp(entry.relativePath, entry.sourceDir, entry.destinationDir);
    }
  }

  private async stamp(relativePath: string, sourceDir: string, destinationDir: string): Promise<void> {
    const { reporter, stats, writeCreationTime } = this.context;
    try {
      await copyMetadata(sourceDir, destinationDir, writeCreationTime);
    } catch (error) {
      if (!(error instanceof MirrorIOError)) throw error;
      const failure = failureFromError(relativePath, error);
      stats.recordFailure(failure);
      reporter.onFileFailed?.(failure);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Phase 1: Plan
// ─────────────────────────────────────────────────────────────────────────────

async function decideFile(
  decision: FileDecision,
  algorithm: MirrorOptions['algorithm']
): Promise<FileDecision> {
  try {
    if (!(await pathExists(decision.destinationPath))) {
      return { ...decision, action: 'create' };
    }
  } catch (error) {
    return { ...decision, action: 'failed', error: new MirrorIOError('digest', decision.destinationPath, error) };
  }

  try {
    const destinationDigest = await computeDigest(decision.destinationPath, algorithm);
    const sourceDigest = await computeDigest(decision.sourcePath, algorithm);
    return {
      ...decision,
      action: destinationDigest === sourceDigest ? 'unchanged' : 'update',
      sourceDigest,
      destinationDigest,
    };
  } catch (error) {
    if (!(error instanceof MirrorIOError)) throw error;
    return { ...decision, action: 'failed', error };
  }
}

async function planVisit(
  visit: DirectoryVisit,
  context: RunContext,
  directories: DestinationDirectories,
  filter: ExclusionFilter
): Promise<FileDecision[]> {
  const { options, sourceRoot, destinationRoot, reporter, stats } = context;

  if (visit.error) {
    const failure = failureFromError(visit.relativePath, visit.error);
    stats.recordFailure(failure);
    reporter.onFileFailed?.(failure);
    return [];
  }

  const destinationDir = visit.relativePath === ''
    ? destinationRoot
    : path.join(destinationRoot, ...visit.relativePath.split('/'));
  const directoryError = await directories.ensure(visit.relativePath, visit.absolutePath, destinationDir);

  const decisions: FileDecision[] = [];
  for (const file of visit.files) {
    stats.recordSeen();
    const pending: FileDecision = {
      relativePath: file.relativePath,
      sourcePath: file.absolutePath,
      destinationPath: path.join(destinationDir, file.name),
      action: 'failed',
    };

    if (filter.isExcluded(sourceRoot, file.absolutePath)) {
      const excluded: FileDecision = { ...pending, action: 'excluded' };
      stats.recordExcluded();
      reporter.onFileExcluded?.(excluded);
      decisions.push(excluded);
      continue;
    }

    const decided = directoryError
      ? { ...pending, action: 'failed' as const, error: directoryError }
      : await decideFile(pending, options.algorithm);

    if (decided.action === 'failed' && decided.error) {
      const failure = failureFromError(decided.relativePath, decided.error);
      stats.recordFailure(failure);
      reporter.onFileFailed?.(failure);
    } else if (decided.action === 'unchanged') {
      stats.recordUnchanged();
      reporter.onFileUnchanged?.(decided);
    }
    decisions.push(decided);
  }
  return decisions;
}

async function buildPlan(context: RunContext, directories: DestinationDirectories): Promise<MirrorPlan> {
  const { options, sourceRoot, destinationRoot } = context;
  const filter = new ExclusionFilter({
    patterns: options.exclude,
    matchAbsolutePaths: options.matchAbsolutePaths,
  });

  const rootError = await directories.ensure('', sourceRoot, destinationRoot);
  if (rootError) {
    throw rootError;
  }

  const visits = await walkSourceTree(sourceRoot, { listDirectory: context.listDirectory });
  const decisions: FileDecision[] = [];
  for (const visit of visits) {
    decisions.push(...(await planVisit(visit, context, directories, filter)));
  }

  return { options, sourceRoot, destinationRoot, decisions };
}

// ─────────────────────────────────────────────────────────────────────────────
// Phase 2: Execute
// ─────────────────────────────────────────────────────────────────────────────

async function executePlan(plan: MirrorPlan, context: RunContext): Promise<void> {
  const { options, reporter, stats, writeCreationTime } = context;
  const limit = pLimit(options.concurrency);
  const pending = plan.decisions.filter(
    (decision): decision is FileDecision & { action: 'create' | 'update' } =>
      decision.action === 'create' || decision.action === 'update'
  );

  if (options.dryRun) {
    for (const decision of pending) {
      stats.recordCopied(decision.action);
      reporter.onFileCopied?.(decision);
    }
    return;
  }

  await Promise.all(
    pending.map((decision) =>
      limit(async () => {
        try {
          const result = await copyFileInBlocks(
            decision.sourcePath,
            decision.destinationPath,
            options.blockSize,
            writeCreationTime
          );
          stats.recordCopied(decision.action, result.bytesCopied);
          reporter.onFileCopied?.(decision, result);
        } catch (error) {
          if (!(error instanceof MirrorIOError)) throw error;
          const failure = failureFromError(decision.relativePath, error);
          stats.recordFailure(failure);
          reporter.onFileFailed?.(failure);
        }
      })
    )
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

async function createContext(input: MirrorOptionsInput, engine: MirrorEngineOptions): Promise<RunContext> {
  const options = resolveMirrorOptions(input);
  const sourceRoot = path.resolve(options.source);
  const destinationRoot = path.resolve(options.destination);

  await assertSourceDirectory(sourceRoot);
  assertDisjointRoots(sourceRoot, destinationRoot);

  return {
    options,
    sourceRoot,
    destinationRoot,
    reporter: engine.reporter ?? {},
    writeCreationTime: engine.writeCreationTime ?? unsupportedCreationTimeWriter,
    listDirectory: engine.listDirectory,
    stats: new MirrorStatsCollector(),
  };
}

/**
 * Run phase 1 only. Always behaves as a dry run: nothing is created or
 * copied, and the returned plan lists every file with its decided action.
 */
export async function planMirror(
  input: MirrorOptionsInput,
  engine: MirrorEngineOptions = {}
): Promise<MirrorPlan> {
  const context = await createContext({ ...input, dryRun: true }, engine);
  return buildPlan(context, new DestinationDirectories(context));
}

/**
 * Mirror `input.source` into `input.destination`.
 *
 * @throws ConfigurationError for invalid options, before touching the filesystem
 * @throws SourceNotFoundError when the source is missing or not a directory
 * @throws MirrorIOError when the destination root cannot be created or the source root cannot be listed
 *
 * Failures on individual files do not abort the run; they are listed in
 * `report.failures`.
 */
export async function mirrorTree(
  input: MirrorOptionsInput,
  engine: MirrorEngineOptions = {}
): Promise<MirrorReport> {
  const context = await createContext(input, engine);
  const { options, sourceRoot, destinationRoot, reporter, stats } = context;
  const startedAt = new Date();
  const started = performance.now();

  reporter.onStart?.({
    source: sourceRoot,
    destination: destinationRoot,
    algorithm: options.algorithm,
    exclude: options.exclude,
    dryRun: options.dryRun,
  });

  const directories = new DestinationDirectories(context);
  const plan = await buildPlan(context, directories);
  await executePlan(plan, context);
  if (!options.dryRun) {
    await directories.restampCreated();
  }

  const report = stats.toReport({
    source: sourceRoot,
    destination: destinationRoot,
    algorithm: options.algorithm,
    dryRun: options.dryRun,
    startedAt: startedAt.toISOString(),
    elapsedMs: performance.now() - started,
  });
  reporter.onComplete?.(report);
  return report;
}
