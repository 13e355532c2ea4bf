import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { copyMetadata, type CreationTimeWriter } from './metadata.js';
import { MirrorIOError } from './errors.js';

const ATIME = 1_600_000_000;
const MTIME = 1_500_000_000;

describe('copyMetadata', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hashmirror-metadata-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('copies access and modification times between files', async () => {
    const source = path.join(tempDir, 'source.txt');
    const dest = path.join(tempDir, 'dest.txt');
    await fs.writeFile(source, 'x');
    await fs.writeFile(dest, 'x');
    await fs.utimes(source, ATIME, MTIME);

    const result = await copyMetadata(source, dest);

    const stats = await fs.stat(dest);
    expect(stats.atimeMs).toBe(ATIME * 1000);
    expect(stats.mtimeMs).toBe(MTIME * 1000);
    expect(result.mtime.getTime()).toBe(MTIME * 1000);
  });

  it('copies times between directories', async () => {
    const source = path.join(tempDir, 'src-dir');
    const dest = path.join(tempDir, 'dest-dir');
    await fs.mkdir(source);
    await fs.mkdir(dest);
    await fs.utimes(source, ATIME, MTIME);

    await copyMetadata(source, dest);

    expect((await fs.stat(dest)).mtimeMs).toBe(MTIME * 1000);
  });

  it('reports creation time as unsupported by default', async () => {
    const source = path.join(tempDir, 'source.txt');
    const dest = path.join(tempDir, 'dest.txt');
    await fs.writeFile(source, 'x');
    await fs.writeFile(dest, 'x');

    const result = await copyMetadata(source, dest);

    expect(result.creationTime).toBe('unsupported');
  });

  it('hands the source birth time to a supplied writer', async () => {
    const source = path.join(tempDir, 'source.txt');
    const dest = path.join(tempDir, 'dest.txt');
    await fs.writeFile(source, 'x');
    await fs.writeFile(dest, 'x');
    const calls: Array<{ destPath: string; birthtime: Date }> = [];
    const writer: CreationTimeWriter = async (destPath, birthtime) => {
      calls.push({ destPath, birthtime });
      return true;
    };

    const result = await copyMetadata(source, dest, writer);

    expect(result.creationTime).toBe('applied');
    expect(calls).toHaveLength(1);
    expect(calls[0].destPath).toBe(dest);
    expect(calls[0].birthtime.getTime()).toBe((await fs.stat(source)).birthtime.getTime());
  });

  it('wraps a missing destination in MirrorIOError', async () => {
    const source = path.join(tempDir, 'source.txt');
    await fs.writeFile(source, 'x');

    await expect(copyMetadata(source, path.join(tempDir, 'missing'))).rejects.toBeInstanceOf(MirrorIOError);
  });
});
