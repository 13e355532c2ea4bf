import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { computeDigest, createHasher, digestBytes } from './digest.js';
import { MirrorIOError, UnsupportedAlgorithmError } from './errors.js';

const SHA256_EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const SHA256_ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const BLAKE3_EMPTY = 'af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262';
const BLAKE3_ABC = '6437b3ac38465133ffb63b75273a8db548c558465d79db03fd359c6cd5bd9d85';

describe('digest', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hashmirror-digest-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('computeDigest', () => {
    it('hashes file contents with sha256', async () => {
      const file = path.join(tempDir, 'abc.txt');
      await fs.writeFile(file, 'abc');

      expect(await computeDigest(file, 'sha256')).toBe(SHA256_ABC);
    });

    it('hashes file contents with blake3', async () => {
      const file = path.join(tempDir, 'abc.txt');
      await fs.writeFile(file, 'abc');

      expect(await computeDigest(file, 'blake3')).toBe(BLAKE3_ABC);
    });

    it('hashes empty files', async () => {
      const file = path.join(tempDir, 'empty');
      await fs.writeFile(file, '');

      expect(await computeDigest(file, 'sha256')).toBe(SHA256_EMPTY);
      expect(await computeDigest(file, 'blake3')).toBe(BLAKE3_EMPTY);
    });

    it('streams files larger than one read chunk', async () => {
      const content = crypto.randomBytes(4096 * 3 + 17);
      const file = path.join(tempDir, 'large.bin');
      await fs.writeFile(file, content);

      const expected = crypto.createHash('sha256').update(content).digest('hex');
      expect(await computeDigest(file, 'sha256')).toBe(expected);
      expect(await computeDigest(file, 'blake3')).toBe(digestBytes(content, 'blake3'));
    });

    it('is deterministic for identical content', async () => {
      const first = path.join(tempDir, 'first');
      const second = path.join(tempDir, 'second');
      await fs.writeFile(first, 'same bytes');
      await fs.writeFile(second, 'same bytes');

      expect(await computeDigest(first, 'blake3')).toBe(await computeDigest(second, 'blake3'));
    });

    it('rejects unknown algorithms before reading', async () => {
      await expect(computeDigest(path.join(tempDir, 'missing'), 'md5')).rejects.toBeInstanceOf(
        UnsupportedAlgorithmError
      );
    });

    it('wraps read failures in MirrorIOError', async () => {
      const missing = path.join(tempDir, 'missing');

      const error = await computeDigest(missing, 'sha256').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MirrorIOError);
      expect((error as MirrorIOError).operation).toBe('digest');
      expect((error as MirrorIOError).path).toBe(missing);
      expect((error as MirrorIOError).errno).toBe('ENOENT');
    });
  });

  describe('createHasher', () => {
    it('accumulates updates incrementally', () => {
      const hasher = createHasher('sha256');
      hasher.update(new TextEncoder().encode('a'));
      hasher.update(new TextEncoder().encode('bc'));

      expect(hasher.digestHex()).toBe(SHA256_ABC);
    });

    it('throws UnsupportedAlgorithmError for unknown names', () => {
      expect(() => createHasher('sha1')).toThrow('Unsupported algorithm: sha1');
    });
  });
});
