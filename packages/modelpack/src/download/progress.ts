/**
 * Throttled download progress reporting.
 */

import type { Logger } from 'pino';
import type { DownloadProgress, ProgressCallback } from './types.js';

const MB = 1024 * 1024;

export function formatMegabytes(bytes: number): string {
  return `${(bytes / MB).toFixed(1)} MB`;
}

/** Build a progress snapshot for a byte count */
export function describeProgress(
  url: string,
  bytesTransferred: number,
  totalBytes: number | null,
): DownloadProgress {
  if (totalBytes !== null && totalBytes > 0) {
    const percent = Math.min(100, Math.floor((bytesTransferred / totalBytes) * 100));
    return {
      url,
      bytesTransferred,
      totalBytes,
      percent,
      message: `${formatMegabytes(bytesTransferred)} / ${formatMegabytes(totalBytes)} (${percent}%)`,
    };
  }
  return {
    url,
    bytesTransferred,
    totalBytes,
    percent: null,
    message: `${formatMegabytes(bytesTransferred)} downloaded`,
  };
}

/**
 * Emits at most one progress line per interval, to the logger and the
 * caller's callback.
 */
export class ProgressReporter {
  private lastReportAt: number;

  constructor(
    private readonly url: string,
    private readonly totalBytes: number | null,
    private readonly logger: Logger,
    private readonly intervalMs: number,
    private readonly onProgress?: ProgressCallback,
    private readonly now: () => number = Date.now,
  ) {
    this.lastReportAt = now();
  }

  /** Record the running byte count; reports when the interval has passed */
  update(bytesTransferred: number): void {
    const now = this.now();
    if (now - this.lastReportAt < this.intervalMs) {
      return;
    }
    this.lastReportAt = now;
    this.emit(describeProgress(this.url, bytesTransferred, this.totalBytes));
  }

  private emit(progress: DownloadProgress): void {
    this.logger.info(
      { url: progress.url, bytes: progress.bytesTransferred, total: progress.totalBytes },
      `Downloading: ${progress.message}`,
    );
    this.onProgress?.(progress);
  }
}
