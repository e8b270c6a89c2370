/**
 * Atomic file publication.
 *
 * Content is written to a uniquely named sibling temp file and renamed
 * onto the target only after the procedure succeeds, so readers see either
 * the old file, no file, or the complete new file.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm } from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { normalizeError } from '../errors.js';

export interface AtomicWriteOptions {
  logger?: Logger;
}

/** Sibling temp path for a target: `{target}.partial.{16 hex chars}` */
export function getPartialPath(targetPath: string): string {
  return `${targetPath}.partial.${randomBytes(8).toString('hex')}`;
}

/**
 * Run `procedure` against a temp path, then move the result onto
 * `targetPath`. On failure the temp file is removed and the original
 * error is rethrown.
 *
 * @returns The target path
 */
export async function writeAtomically(
  targetPath: string,
  procedure: (tempPath: string) => Promise<void>,
  options: AtomicWriteOptions = {},
): Promise<string> {
  const tempPath = getPartialPath(targetPath);

  try {
    await mkdir(path.dirname(targetPath), { recursive: true });
    await procedure(tempPath);
    await rename(tempPath, targetPath);
  } catch (err) {
    try {
      await rm(tempPath, { force: true });
    } catch (cleanupErr) {
      options.logger?.warn({ tempPath, err: cleanupErr }, 'Failed to remove partial file');
    }
    throw normalizeError(err);
  }

  return targetPath;
}
