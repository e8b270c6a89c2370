/**
 * Cross-process lock over a cache path.
 *
 * The lock is the file `{cachePath}.lock`, created with an exclusive
 * create (`wx`). Whoever creates it holds the lock; deleting it releases.
 * Waiters back off exponentially (100 ms doubling to 5 s) until the
 * timeout. A lock file whose mtime is older than the stale threshold is
 * presumed abandoned by a crashed holder: it is renamed aside to a unique
 * `.stale.{hex}` path and acquisition is retried at once. When the file
 * renamed aside turns out to be fresh (another waiter broke the stale lock
 * first and created its own), it is linked back into place. Holders
 * refresh the mtime while they hold the lock so a long download never
 * looks stale, and only delete the lock file while it still carries their
 * own content.
 */

import { randomBytes } from 'node:crypto';
import { link, mkdir, open, readFile, rename, stat, unlink, utimes } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { pino } from 'pino';
import type { Logger } from 'pino';
import {
  CancelledError,
  LockTimeoutError,
  errnoCode,
  normalizeError,
  throwIfCancelled,
} from '../errors.js';
import { getLockPath } from './paths.js';

export const DEFAULT_LOCK_TIMEOUT_MS = 15 * 60_000;
export const DEFAULT_STALE_LOCK_MS = 10 * 60_000;

export interface LockOptions {
  /** Give up after this long (default: 15 minutes) */
  timeoutMs?: number;

  /** Break lock files older than this (default: 10 minutes) */
  staleMs?: number;

  /** First backoff delay (default: 100 ms) */
  initialDelayMs?: number;

  /** Backoff ceiling (default: 5 s) */
  maxDelayMs?: number;

  signal?: AbortSignal;
  logger?: Logger;
}

/** Content written into the lock file, for humans inspecting a stuck lock */
interface LockFileContent {
  pid: number;
  acquiredAt: string;
  owner: string;
}

/**
 * A held lock. Release exactly once; further calls are no-ops.
 */
export class FileLock {
  private released = false;
  private readonly keepAlive: NodeJS.Timeout;

  constructor(
    public readonly lockPath: string,
    private readonly content: string,
    private readonly logger: Logger,
    staleMs: number,
  ) {
    // Refresh well inside the stale window
    this.keepAlive = setInterval(() => {
      const now = new Date();
      utimes(this.lockPath, now, now).catch((err: unknown) => {
        this.logger.debug({ lockPath: this.lockPath, err }, 'Failed to refresh lock file');
      });
    }, Math.max(1000, Math.floor(staleMs / 3)));
    this.keepAlive.unref();
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Delete the lock file if it is still ours. Failures are logged, never
   * thrown: a lock that cannot be deleted will eventually be broken as stale.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    clearInterval(this.keepAlive);
    try {
      const current = await readFile(this.lockPath, 'utf-8');
      if (current !== this.content) {
        this.logger.warn({ lockPath: this.lockPath }, 'Lock file belongs to another holder; leaving it');
        return;
      }
      await unlink(this.lockPath);
      this.logger.debug({ lockPath: this.lockPath }, 'Lock released');
    } catch (err) {
      this.logger.debug({ lockPath: this.lockPath, err }, 'Failed to delete lock file');
    }
  }
}

/**
 * Try to create the lock file once.
 * Returns the content written, or null when another holder already has it.
 */
async function tryCreateLockFile(lockPath: string, logger: Logger): Promise<string | null> {
  let handle: FileHandle;
  try {
    handle = await open(lockPath, 'wx');
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') return null;
    throw normalizeError(err);
  }

  const content: LockFileContent = {
    pid: process.pid,
    acquiredAt: new Date().toISOString(),
    owner: randomBytes(8).toString('hex'),
  };
  const serialized = JSON.stringify(content);
  try {
    await handle.writeFile(serialized);
  } catch (err) {
    await handle.close();
    await unlink(lockPath).catch((cleanupErr: unknown) => {
      logger.debug({ lockPath, err: cleanupErr }, 'Failed to remove half-written lock file');
    });
    throw normalizeError(err);
  }
  await handle.close();
  return serialized;
}

async function mtimeOf(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).mtimeMs;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw normalizeError(err);
  }
}

/**
 * Break the lock file if it is older than `staleMs`.
 * Returns true when the caller should retry immediately: the lock was
 * broken, or it vanished between the create attempt and the check.
 *
 * The stat and the break are not atomic, so the file is renamed aside
 * first and its age checked again there. A fresh file found aside is
 * another holder's lock and goes back into place.
 */
async function breakIfStale(lockPath: string, staleMs: number, logger: Logger): Promise<boolean> {
  const mtimeMs = await mtimeOf(lockPath);
  if (mtimeMs === null) return true;
  if (Date.now() - mtimeMs <= staleMs) return false;

  const stalePath = `${lockPath}.stale.${randomBytes(8).toString('hex')}`;
  try {
    await rename(lockPath, stalePath);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return true;
    throw normalizeError(err);
  }

  const asideMtimeMs = await mtimeOf(stalePath);
  if (asideMtimeMs !== null && Date.now() - asideMtimeMs <= staleMs) {
    try {
      await link(stalePath, lockPath);
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') throw normalizeError(err);
      logger.warn({ lockPath }, 'Lock file was replaced while restoring it');
    } finally {
      await unlink(stalePath).catch((err: unknown) => {
        logger.debug({ stalePath, err }, 'Failed to remove renamed lock file');
      });
    }
    return false;
  }

  logger.warn({ lockPath, ageMs: Date.now() - mtimeMs, staleMs }, 'Breaking stale lock file');
  await unlink(stalePath).catch((err: unknown) => {
    logger.debug({ stalePath, err }, 'Failed to remove renamed lock file');
  });
  return true;
}

async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    throw new CancelledError('Cancelled while waiting for lock', { cause: err });
  }
}

/**
 * Acquire the lock for a cache path.
 *
 * @throws LockTimeoutError when the lock is still held after the timeout
 * @throws CancelledError when the signal aborts the wait
 */
export async function acquireLock(cachePath: string, options: LockOptions = {}): Promise<FileLock> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const staleMs = options.staleMs ?? DEFAULT_STALE_LOCK_MS;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const logger = (options.logger ?? pino({ level: 'silent' })).child({ component: 'lock' });
  const lockPath = getLockPath(cachePath);

  await mkdir(path.dirname(lockPath), { recursive: true }).catch((err: unknown) => {
    throw normalizeError(err);
  });

  const start = Date.now();
  let delayMs = options.initialDelayMs ?? 100;
  let waiting = false;

  while (true) {
    throwIfCancelled(options.signal);

    const content = await tryCreateLockFile(lockPath, logger);
    if (content !== null) {
      logger.debug({ lockPath, waitedMs: Date.now() - start }, 'Lock acquired');
      return new FileLock(lockPath, content, logger, staleMs);
    }

    if (await breakIfStale(lockPath, staleMs, logger)) {
      continue;
    }

    const elapsed = Date.now() - start;
    if (elapsed >= timeoutMs) {
      throw new LockTimeoutError(lockPath, timeoutMs);
    }

    if (!waiting) {
      logger.info({ lockPath }, 'Waiting for another process to finish with this file');
      waiting = true;
    }

    await wait(Math.min(delayMs, timeoutMs - elapsed), options.signal);
    delayMs = Math.min(delayMs * 2, maxDelayMs);
  }
}

/**
 * Run `fn` while holding the lock for `cachePath`.
 * The lock is released on success, failure and cancellation alike.
 */
export async function withLock<T>(
  cachePath: string,
  fn: (lock: FileLock) => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  const lock = await acquireLock(cachePath, options);
  try {
    return await fn(lock);
  } finally {
    await lock.release();
  }
}
