import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '@hashmirror/core';
import { buildMirrorInput, configFromFlags } from './options.js';

describe('configFromFlags', () => {
  it('keeps only flags that were given', () => {
    expect(configFromFlags({ dryRun: false, json: false, quiet: false, matchAbsolute: false })).toEqual({});
  });

  it('normalizes numeric and algorithm flags', () => {
    expect(
      configFromFlags({ algorithm: 'blake3', blockSize: '8192', concurrency: '4', matchAbsolute: true, exclude: ['x'] })
    ).toEqual({
      algorithm: 'blake3',
      blockSize: 8192,
      concurrency: 4,
      matchAbsolutePaths: true,
      exclude: ['x'],
    });
  });

  it('leaves unparseable numbers for validation to reject', () => {
    expect(configFromFlags({ blockSize: 'big' }).blockSize).toBeNaN();
  });
});

describe('buildMirrorInput', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hashmirror-options-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('strips quotes from positional paths', async () => {
    const input = await buildMirrorInput('"/data/photos"', '"/backup/photos"', {});

    expect(input).toEqual({ source: '/data/photos', destination: '/backup/photos', dryRun: false });
  });

  it('layers flags over the config file and appends exclusions', async () => {
    await fs.writeFile(
      path.join(tempDir, 'mirror.json'),
      JSON.stringify({ algorithm: 'sha256', blockSize: 1024, exclude: ['\\.tmp$'], concurrency: 2 })
    );

    const input = await buildMirrorInput(
      'src',
      'dest',
      { config: 'mirror.json', algorithm: 'blake3', exclude: ['^cache/'], dryRun: true },
      tempDir
    );

    expect(input).toEqual({
      source: 'src',
      destination: 'dest',
      algorithm: 'blake3',
      blockSize: 1024,
      concurrency: 2,
      exclude: ['\\.tmp$', '^cache/'],
      dryRun: true,
    });
  });

  it('fails with a ConfigurationError when the config file is missing', async () => {
    await expect(buildMirrorInput('src', 'dest', { config: 'absent.json' }, tempDir)).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
