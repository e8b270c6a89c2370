/**
 * Types for downloading model files.
 */

import type { Logger } from 'pino';

/** The subset of the global fetch the downloader relies on */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** A progress snapshot handed to `onProgress` */
export interface DownloadProgress {
  /** URL being downloaded, query string redacted */
  url: string;

  bytesTransferred: number;

  /** Content length, when the source reports one */
  totalBytes: number | null;

  /** Whole-number percentage, when the total is known */
  percent: number | null;

  /** Human-readable line, e.g. "12.5 MB / 50.0 MB (25%)" */
  message: string;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface DownloadOptions {
  /** Bearer token for HTTP sources */
  token?: string | null;

  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  logger?: Logger;

  /** Defaults to the global fetch */
  fetch?: FetchLike;

  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;

  /** Attempt n waits base * 2^n before retrying (default: 1000) */
  retryBaseDelayMs?: number;

  /** Minimum interval between progress lines (default: 5000) */
  progressIntervalMs?: number;
}

export interface DownloadResult {
  bytesTransferred: number;
  attempts: number;
  durationMs: number;
}
