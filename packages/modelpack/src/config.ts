/**
 * Runtime configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import * as os from 'node:os';
import * as path from 'node:path';

/** Environment variable names consumed by modelpack */
export const ENV = {
  source: 'MODELPACK_SOURCE',
  cacheDir: 'MODELPACK_CACHE_DIR',
  token: 'HF_TOKEN',
  logLevel: 'MODELPACK_LOG_LEVEL',
  configDir: 'MODELPACK_CONFIG_DIR',
  lockTimeoutMs: 'MODELPACK_LOCK_TIMEOUT_MS',
  staleLockMs: 'MODELPACK_STALE_LOCK_MS',
} as const;

export interface RuntimeConfig {
  /** Source name override (precedence level 3) */
  sourceOverride: string | null;

  /** Cache root override */
  cacheDir: string | null;

  /** Default bearer token for HTTP sources */
  token: string | null;

  /** Directory holding the user-level model-sources file */
  userConfigDir: string;

  /** Directory holding the project-level model-sources file */
  projectConfigDir: string;

  /** How long to wait for a cache-path lock (default: 15 minutes) */
  lockTimeoutMs: number;

  /** Age after which a lock file is presumed abandoned (default: 10 minutes) */
  staleLockMs: number;

  /** Total download attempts, including the first */
  maxAttempts: number;

  /** Base of the retry delay; attempt n waits base * 2^n */
  retryBaseDelayMs: number;

  /** Minimum interval between progress lines */
  progressIntervalMs: number;
}

export const DEFAULT_RUNTIME_CONFIG: Pick<
  RuntimeConfig,
  'lockTimeoutMs' | 'staleLockMs' | 'maxAttempts' | 'retryBaseDelayMs' | 'progressIntervalMs'
> = {
  lockTimeoutMs: 15 * 60_000,
  staleLockMs: 10 * 60_000,
  maxAttempts: 3,
  retryBaseDelayMs: 1000,
  progressIntervalMs: 5000,
};

function getEnv(key: string): string | null {
  const value = process.env[key];
  return value === undefined || value === '' ? null : value;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build runtime config from environment variables and optional overrides.
 *
 * Environment variables:
 * - MODELPACK_SOURCE: Source name override
 * - MODELPACK_CACHE_DIR: Cache root
 * - HF_TOKEN: Bearer token for HTTP sources
 * - MODELPACK_CONFIG_DIR: User-level config directory (default: ~/.modelpack)
 * - MODELPACK_LOCK_TIMEOUT_MS: Lock acquire timeout (default: 900000)
 * - MODELPACK_STALE_LOCK_MS: Stale lock threshold (default: 600000)
 */
export function buildRuntimeConfig(overrides?: Partial<RuntimeConfig>): RuntimeConfig {
  return {
    sourceOverride: overrides?.sourceOverride ?? getEnv(ENV.source),
    cacheDir: overrides?.cacheDir ?? getEnv(ENV.cacheDir),
    token: overrides?.token ?? getEnv(ENV.token),
    userConfigDir:
      overrides?.userConfigDir ?? getEnv(ENV.configDir) ?? path.join(os.homedir(), '.modelpack'),
    projectConfigDir: overrides?.projectConfigDir ?? process.cwd(),
    lockTimeoutMs:
      overrides?.lockTimeoutMs ??
      getEnvNumber(ENV.lockTimeoutMs, DEFAULT_RUNTIME_CONFIG.lockTimeoutMs),
    staleLockMs:
      overrides?.staleLockMs ?? getEnvNumber(ENV.staleLockMs, DEFAULT_RUNTIME_CONFIG.staleLockMs),
    maxAttempts: overrides?.maxAttempts ?? DEFAULT_RUNTIME_CONFIG.maxAttempts,
    retryBaseDelayMs: overrides?.retryBaseDelayMs ?? DEFAULT_RUNTIME_CONFIG.retryBaseDelayMs,
    progressIntervalMs: overrides?.progressIntervalMs ?? DEFAULT_RUNTIME_CONFIG.progressIntervalMs,
  };
}

/**
 * Validate a runtime configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateRuntimeConfig(config: RuntimeConfig): string[] {
  const errors: string[] = [];

  if (!config.userConfigDir) {
    errors.push('userConfigDir is required');
  }

  if (!config.projectConfigDir) {
    errors.push('projectConfigDir is required');
  }

  if (config.lockTimeoutMs < 0) {
    errors.push('lockTimeoutMs must not be negative');
  }

  if (config.staleLockMs < 1000) {
    errors.push('staleLockMs must be at least 1000 (1 second)');
  }

  if (config.maxAttempts < 1) {
    errors.push('maxAttempts must be at least 1');
  }

  if (config.retryBaseDelayMs < 0) {
    errors.push('retryBaseDelayMs must not be negative');
  }

  if (config.progressIntervalMs < 0) {
    errors.push('progressIntervalMs must not be negative');
  }

  return errors;
}
