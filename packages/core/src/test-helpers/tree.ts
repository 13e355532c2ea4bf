import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `hashmirror-${label}-test-`));
}

/** Write `/`-separated relative paths under `root`, creating parents */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export function readText(root: string, relativePath: string): Promise<string> {
  return fs.readFile(path.join(root, ...relativePath.split('/')), 'utf8');
}

export async function exists(target: string): Promise<boolean> {
  return fs.access(target).then(() => true).catch(() => false);
}
