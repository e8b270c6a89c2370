/**
 * Integrity verification for cached files.
 *
 * Hashes are computed over a read stream so memory stays flat whatever
 * the file size. A file that fails verification is deleted.
 */

import * as crypto from 'node:crypto';
import { createReadStream } from 'node:fs';
import { rm, stat } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import {
  HashMismatchError,
  NotFoundError,
  SizeMismatchError,
  errnoCode,
  normalizeError,
  throwIfCancelled,
} from '../errors.js';

const READ_BUFFER_SIZE = 80 * 1024;

export interface FileHashResult {
  /** Lower-case hex SHA-256 digest */
  hash: string;
  sizeBytes: number;
}

export interface VerifyOptions {
  signal?: AbortSignal;
}

/**
 * Compute the SHA-256 of a file using a streaming approach.
 *
 * @throws NotFoundError if the file does not exist
 */
export async function hashFile(filePath: string, options: VerifyOptions = {}): Promise<FileHashResult> {
  throwIfCancelled(options.signal);
  const hash = crypto.createHash('sha256');
  let sizeBytes = 0;

  try {
    await pipeline(
      createReadStream(filePath, { highWaterMark: READ_BUFFER_SIZE }),
      async (source: AsyncIterable<Buffer>) => {
        for await (const chunk of source) {
          sizeBytes += chunk.length;
          hash.update(chunk);
        }
      },
      { signal: options.signal },
    );
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new NotFoundError(`File not found: ${filePath}`, { path: filePath }, { cause: err });
    }
    throw normalizeError(err);
  }

  return { hash: hash.digest('hex'), sizeBytes };
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).size;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw normalizeError(err);
  }
}

async function deleteInvalid(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    throw normalizeError(err);
  }
}

/**
 * Check a file against its expected size and digest.
 * On mismatch the file is deleted before the error is thrown.
 *
 * @param expectedSize - Skipped when null or undefined
 * @throws NotFoundError when the file is absent
 * @throws SizeMismatchError / HashMismatchError on mismatch
 */
export async function verifyFile(
  filePath: string,
  expectedSha256: string,
  expectedSize?: number | null,
  options: VerifyOptions = {},
): Promise<void> {
  throwIfCancelled(options.signal);

  const actualSize = await fileSize(filePath);
  if (actualSize === null) {
    throw new NotFoundError(`File not found: ${filePath}`, { path: filePath });
  }

  if (expectedSize !== undefined && expectedSize !== null && actualSize !== expectedSize) {
    await deleteInvalid(filePath);
    throw new SizeMismatchError(filePath, expectedSize, actualSize);
  }

  const { hash } = await hashFile(filePath, options);
  if (hash !== expectedSha256.toLowerCase()) {
    await deleteInvalid(filePath);
    throw new HashMismatchError(filePath, expectedSha256, hash);
  }
}

/**
 * Non-destructive check: true when the file exists and matches.
 * Never deletes anything.
 */
export async function isValidFile(
  filePath: string,
  expectedSha256: string,
  expectedSize?: number | null,
  options: VerifyOptions = {},
): Promise<boolean> {
  const actualSize = await fileSize(filePath);
  if (actualSize === null) {
    return false;
  }
  if (expectedSize !== undefined && expectedSize !== null && actualSize !== expectedSize) {
    return false;
  }
  try {
    const { hash } = await hashFile(filePath, options);
    return hash === expectedSha256.toLowerCase();
  } catch (err) {
    // Removed between the stat and the read
    if (err instanceof NotFoundError) return false;
    throw err;
  }
}
