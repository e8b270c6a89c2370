/**
 * File downloader.
 *
 * Streams a URL to a local path. HTTP(S) goes through fetch with bounded
 * retries for transient failures; file:// URLs are stream-copied once.
 * Neither path buffers the whole file in memory.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { pino } from 'pino';
import type { Logger } from 'pino';
import {
  AuthenticationError,
  CancelledError,
  DownloadError,
  ModelPackError,
  NotFoundError,
  errnoCode,
  normalizeError,
  throwIfCancelled,
} from '../errors.js';
import { redactUrl } from '../url.js';
import { USER_AGENT } from '../version.js';
import { ProgressReporter, formatMegabytes } from './progress.js';
import type { DownloadOptions, DownloadResult, FetchLike } from './types.js';

/** Read and write buffer size */
export const STREAM_BUFFER_SIZE = 80 * 1024;

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
const DEFAULT_PROGRESS_INTERVAL_MS = 5000;

interface TransferContext {
  url: string;
  destinationPath: string;
  logger: Logger;
  signal?: AbortSignal;
  progressIntervalMs: number;
  onProgress: DownloadOptions['onProgress'];
}

/** Map a non-2xx status to the error taxonomy */
export function classifyHttpStatus(status: number, url: string): ModelPackError {
  const safeUrl = redactUrl(url);
  if (status === 401 || status === 403) {
    return new AuthenticationError(status, safeUrl);
  }
  if (status === 404) {
    return new NotFoundError(
      `HTTP 404: ${safeUrl} was not found. Check the source configuration.`,
      { url: safeUrl },
    );
  }
  return new DownloadError(`HTTP ${status} while downloading ${safeUrl}`, {
    status,
    transient: status === 429 || status >= 500,
  });
}

function isTransient(err: unknown): boolean {
  return err instanceof DownloadError && err.transient;
}

function parseContentLength(header: string | null): number | null {
  if (header === null) return null;
  const value = parseInt(header, 10);
  return isNaN(value) || value < 0 ? null : value;
}

/** Pass-through stream that feeds the progress reporter */
function createCounter(reporter: ProgressReporter): { stream: Transform; bytes: () => number } {
  let bytes = 0;
  const stream = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytes += chunk.length;
      reporter.update(bytes);
      callback(null, chunk);
    },
  });
  return { stream, bytes: () => bytes };
}

// ---------------------------------------------------------------------------
// file://
// ---------------------------------------------------------------------------

async function copyLocalFile(ctx: TransferContext): Promise<number> {
  const sourcePath = fileURLToPath(ctx.url);
  try {
    const { size } = await stat(sourcePath);
    const reporter = new ProgressReporter(
      ctx.url,
      size,
      ctx.logger,
      ctx.progressIntervalMs,
      ctx.onProgress,
    );
    const counter = createCounter(reporter);
    await pipeline(
      createReadStream(sourcePath, { highWaterMark: STREAM_BUFFER_SIZE }),
      counter.stream,
      createWriteStream(ctx.destinationPath, { highWaterMark: STREAM_BUFFER_SIZE }),
      { signal: ctx.signal },
    );
    return counter.bytes();
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new NotFoundError(`Source file not found: ${sourcePath}`, { url: ctx.url }, { cause: err });
    }
    throw normalizeError(err);
  }
}

// ---------------------------------------------------------------------------
// HTTP(S)
// ---------------------------------------------------------------------------

async function fetchOnce(
  ctx: TransferContext,
  fetchImpl: FetchLike,
  token: string | null,
): Promise<number> {
  const safeUrl = redactUrl(ctx.url);
  const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  let response: Response;
  try {
    response = await fetchImpl(ctx.url, { headers, redirect: 'follow', signal: ctx.signal });
  } catch (err) {
    if (ctx.signal?.aborted || normalizeError(err) instanceof CancelledError) {
      throw new CancelledError(undefined, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new DownloadError(`Request to ${safeUrl} failed: ${message}`, { transient: true, cause: err });
  }

  if (!response.ok) {
    await response.body?.cancel().catch((err: unknown) => {
      ctx.logger.debug({ url: safeUrl, err }, 'Failed to discard response body');
    });
    throw classifyHttpStatus(response.status, ctx.url);
  }

  if (!response.body) {
    throw new DownloadError(`Empty response body from ${safeUrl}`, { status: response.status, transient: false });
  }

  const total = parseContentLength(response.headers.get('content-length'));
  const reporter = new ProgressReporter(safeUrl, total, ctx.logger, ctx.progressIntervalMs, ctx.onProgress);
  const counter = createCounter(reporter);

  try {
    await pipeline(
      Readable.fromWeb(response.body),
      counter.stream,
      createWriteStream(ctx.destinationPath, { highWaterMark: STREAM_BUFFER_SIZE }),
      { signal: ctx.signal },
    );
  } catch (err) {
    if (ctx.signal?.aborted) {
      throw new CancelledError(undefined, { cause: err });
    }
    const normalized = normalizeError(err);
    if (normalized instanceof ModelPackError) {
      throw normalized;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new DownloadError(`Transfer from ${safeUrl} was interrupted: ${message}`, {
      transient: true,
      cause: err,
    });
  }

  return counter.bytes();
}

async function waitBeforeRetry(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    throw new CancelledError('Cancelled while waiting to retry', { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Download `url` to `destinationPath`, overwriting it.
 *
 * @throws AuthenticationError on 401/403
 * @throws NotFoundError on 404 or a missing file:// source
 * @throws DownloadError when retries are exhausted or the failure is permanent
 * @throws CancelledError when the signal aborts
 */
export async function download(
  url: string,
  destinationPath: string,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const logger = (options.logger ?? pino({ level: 'silent' })).child({ component: 'downloader' });
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  const ctx: TransferContext = {
    url,
    destinationPath,
    logger,
    signal: options.signal,
    progressIntervalMs: options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS,
    onProgress: options.onProgress,
  };
  const safeUrl = redactUrl(url);
  const startTime = Date.now();

  throwIfCancelled(options.signal);
  logger.info({ url: safeUrl, destinationPath }, 'Starting download');

  if (new URL(url).protocol === 'file:') {
    const bytes = await copyLocalFile(ctx);
    const durationMs = Date.now() - startTime;
    logger.info({ url: safeUrl, bytes, durationMs }, `Download complete: ${formatMegabytes(bytes)}`);
    return { bytesTransferred: bytes, attempts: 1, durationMs };
  }

  const fetchImpl = options.fetch ?? fetch;
  const token = options.token ?? null;

  for (let attempt = 1; ; attempt++) {
    throwIfCancelled(options.signal);
    try {
      const bytes = await fetchOnce(ctx, fetchImpl, token);
      const durationMs = Date.now() - startTime;
      logger.info(
        { url: safeUrl, bytes, attempts: attempt, durationMs },
        `Download complete: ${formatMegabytes(bytes)}`,
      );
      return { bytesTransferred: bytes, attempts: attempt, durationMs };
    } catch (err) {
      if (!isTransient(err) || attempt >= maxAttempts) {
        throw err;
      }
      const delayMs = baseDelayMs * 2 ** attempt;
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { url: safeUrl, attempt, maxAttempts, delayMs, error: message },
        `Download attempt ${attempt}/${maxAttempts} failed; retrying`,
      );
      await waitBeforeRetry(delayMs, options.signal);
    }
  }
}
