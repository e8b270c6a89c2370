import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { hashFile, isValidFile, verifyFile } from '../integrity/verifier.js';
import {
  CancelledError,
  HashMismatchError,
  NotFoundError,
  SizeMismatchError,
} from '../errors.js';
import { sha256 } from './helpers.js';

describe('integrity verifier', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'modelpack-verify-test-'));
    filePath = path.join(tmpDir, 'model.onnx');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('hashFile', () => {
    it('should compute SHA-256 and size', async () => {
      fs.writeFileSync(filePath, 'hello world');

      const result = await hashFile(filePath);

      expect(result).toEqual({ hash: sha256('hello world'), sizeBytes: 11 });
    });

    it('should hash files larger than the read buffer', async () => {
      const content = 'abcdefgh'.repeat(40_000);
      fs.writeFileSync(filePath, content);

      const result = await hashFile(filePath);

      expect(result.hash).toBe(sha256(content));
      expect(result.sizeBytes).toBe(320_000);
    });

    it('should handle empty files', async () => {
      fs.writeFileSync(filePath, '');
      const result = await hashFile(filePath);
      expect(result.hash).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(result.sizeBytes).toBe(0);
    });

    it('should report a missing file', async () => {
      await expect(hashFile(filePath)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should honour an aborted signal', async () => {
      fs.writeFileSync(filePath, 'content');
      const controller = new AbortController();
      controller.abort();
      await expect(hashFile(filePath, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError,
      );
    });
  });

  describe('verifyFile', () => {
    it('should accept a matching file', async () => {
      fs.writeFileSync(filePath, 'weights');
      await expect(verifyFile(filePath, sha256('weights'), 7)).resolves.toBeUndefined();
      expect(fs.existsSync(filePath)).toBe(true);
    });

    it('should compare digests case-insensitively', async () => {
      fs.writeFileSync(filePath, 'weights');
      await expect(verifyFile(filePath, sha256('weights').toUpperCase())).resolves.toBeUndefined();
    });

    it('should skip the size check when size is unknown', async () => {
      fs.writeFileSync(filePath, 'weights');
      await expect(verifyFile(filePath, sha256('weights'), null)).resolves.toBeUndefined();
    });

    it('should delete a file with the wrong size', async () => {
      fs.writeFileSync(filePath, 'a'.repeat(50));

      const err = await verifyFile(filePath, sha256('a'.repeat(100)), 100).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SizeMismatchError);
      if (err instanceof SizeMismatchError) {
        expect(err.expectedSize).toBe(100);
        expect(err.actualSize).toBe(50);
      }
      expect(fs.existsSync(filePath)).toBe(false);
    });

    it('should delete a file with a single corrupted byte', async () => {
      const original = 'model-weights-0123456789';
      const corrupted = `X${original.slice(1)}`;
      fs.writeFileSync(filePath, corrupted);

      const err = await verifyFile(filePath, sha256(original), original.length).catch(
        (e: unknown) => e,
      );

      expect(err).toBeInstanceOf(HashMismatchError);
      if (err instanceof HashMismatchError) {
        expect(err.actualSha256).toBe(sha256(corrupted));
        expect(err.message).toContain('Force a redownload or fix the source configuration.');
      }
      expect(fs.existsSync(filePath)).toBe(false);
    });

    it('should report a missing file without deleting anything', async () => {
      const err = await verifyFile(filePath, sha256('x')).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NotFoundError);
      expect(err instanceof NotFoundError && err.category).toBe('verification');
    });
  });

  describe('isValidFile', () => {
    it('should return true for a matching file', async () => {
      fs.writeFileSync(filePath, 'weights');
      expect(await isValidFile(filePath, sha256('weights'), 7)).toBe(true);
    });

    it('should return false for a missing file', async () => {
      expect(await isValidFile(filePath, sha256('weights'), 7)).toBe(false);
    });

    it('should return false without deleting on mismatch', async () => {
      fs.writeFileSync(filePath, 'tampered');

      expect(await isValidFile(filePath, sha256('weights'))).toBe(false);
      expect(await isValidFile(filePath, sha256('tampered'), 3)).toBe(false);
      expect(fs.existsSync(filePath)).toBe(true);
    });
  });
});
