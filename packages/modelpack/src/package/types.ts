/**
 * Types for the model package orchestrator.
 */

import type { Logger } from 'pino';
import type { RuntimeConfig } from '../config.js';
import type { FetchLike, ProgressCallback } from '../download/types.js';
import type { ResolutionLevel } from '../sources/types.js';

/** Defaults compiled into the application that ships the manifest */
export interface BundledDefaults {
  /** Source name used when no override names one */
  source?: string;

  /** Cache root used when neither the caller nor the environment set one */
  cacheDir?: string;
}

export interface ModelPackageDependencies {
  /** Defaults to createLogger() */
  logger?: Logger;

  /** Overrides on top of the environment-derived runtime config */
  config?: Partial<RuntimeConfig>;

  /** Defaults to the global fetch */
  fetch?: FetchLike;

  bundled?: BundledDefaults;
}

/** Per-call options that only need to locate files */
export interface LocateOptions {
  /** Source name, or an absolute http(s):// or file:// URL used verbatim */
  source?: string;

  /** Cache root override */
  cacheDir?: string;

  signal?: AbortSignal;
}

export interface EnsureOptions extends LocateOptions {
  /** Bearer token; defaults to HF_TOKEN */
  token?: string;

  /** Download even when a valid cached copy exists */
  forceRedownload?: boolean;

  onProgress?: ProgressCallback;

  /** Files fetched in parallel by ensureFiles (default: 1) */
  concurrency?: number;
}

/** Where a file comes from and where it lives, without touching either */
export interface ModelInfo {
  modelId: string;
  revision: string;

  /** Path as listed in the manifest */
  filePath: string;

  /** Name of the cached file */
  fileName: string;

  sha256: string;
  expectedBytes: number | null;

  sourceName: string;
  resolutionLevel: ResolutionLevel;

  /** Download URL, query string redacted */
  url: string;

  localPath: string;
}
