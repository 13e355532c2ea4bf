import fs from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import { MirrorIOError } from './errors.js';

export interface SourceFile {
  name: string;
  /** Relative to the source root, `/`-separated */
  relativePath: string;
  absolutePath: string;
}

export interface DirectoryVisit {
  /** Relative to the source root, `/`-separated; `''` for the root itself */
  relativePath: string;
  absolutePath: string;
  files: SourceFile[];
  /** Set when the directory could not be listed; `files` is then empty */
  error?: MirrorIOError;
}

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface ListedEntry {
  name: string;
  kind: EntryKind;
}

/** Lists the direct children of one directory, without following links */
export type DirectoryLister = (absoluteDir: string) => Promise<ListedEntry[]>;

export interface WalkOptions {
  listDirectory?: DirectoryLister;
}

function kindOf(dirent: fg.Entry['dirent']): EntryKind {
  if (dirent.isSymbolicLink()) return 'symlink';
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  return 'other';
}

export const listDirectoryWithGlob: DirectoryLister = async (absoluteDir) => {
  const entries = await fg('*', {
    cwd: absoluteDir,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    deep: 1,
  });
  return entries.map((entry) => ({ name: entry.name, kind: kindOf(entry.dirent) }));
};

/**
 * Order by path segments so that every directory sorts before its
 * descendants and siblings sort by name (code point order, locale independent).
 */
export function compareRelativePaths(a: string, b: string): number {
  const left = a === '' ? [] : a.split('/');
  const right = b === '' ? [] : b.split('/');
  const shared = Math.min(left.length, right.length);
  for (let index = 0; index < shared; index += 1) {
    if (left[index] !== right[index]) {
      return left[index] < right[index] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

/**
 * Symbolic links are not descended into. A link that resolves to a file is
 * mirrored as a file; a dangling link is reported as a file too, so the copy
 * step records its failure.
 */
async function isFileLike(absolutePath: string, kind: EntryKind): Promise<boolean> {
  if (kind === 'file') {
    return true;
  }
  if (kind !== 'symlink') {
    return false;
  }
  try {
    return (await fs.stat(absolutePath)).isFile();
  } catch {
    return true;
  }
}

const joinRelative = (parent: string, name: string) => (parent === '' ? name : `${parent}/${name}`);

/**
 * Enumerate the source tree in depth-first pre-order: the root first, each
 * directory before its subdirectories, each visit carrying the files that sit
 * directly inside it. The order is stable for a given tree.
 *
 * A subdirectory that cannot be listed is returned with `error` set and is not
 * descended into; the rest of the tree is still walked.
 *
 * @throws MirrorIOError when the root itself cannot be listed
 */
export async function walkSourceTree(sourceRoot: string, options: WalkOptions = {}): Promise<DirectoryVisit[]> {
  const listDirectory = options.listDirectory ?? listDirectoryWithGlob;
  const visits: DirectoryVisit[] = [];

  const visit = async (relativePath: string, absolutePath: string): Promise<void> => {
    let entries: ListedEntry[];
    try {
      entries = await listDirectory(absolutePath);
    } catch (error) {
      const failure = new MirrorIOError('walk', absolutePath, error);
      if (relativePath === '') {
        throw failure;
      }
      visits.push({ relativePath, absolutePath, files: [], error: failure });
      return;
    }

    const files: SourceFile[] = [];
    const subdirectories: string[] = [];
    for (const entry of entries) {
      const childPath = path.join(absolutePath, entry.name);
      if (entry.kind === 'directory') {
        subdirectories.push(entry.name);
      } else if (await isFileLike(childPath, entry.kind)) {
        files.push({ name: entry.name, relativePath: joinRelative(relativePath, entry.name), absolutePath: childPath });
      }
    }

    files.sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));
    visits.push({ relativePath, absolutePath, files });

    for (const name of subdirectories.sort((a, b) => compareRelativePaths(a, b))) {
      await visit(joinRelative(relativePath, name), path.join(absolutePath, name));
    }
  };

  await visit('', sourceRoot);
  return visits;
}
