/**
 * Default structured logger.
 *
 * Diagnostics go to stderr so stdout stays free for the primary result
 * (a resolved path, for instance).
 */

import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { ENV } from './config.js';

const LEVELS: LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(level?: string): LevelWithSilent {
  const raw = level ?? process.env[ENV.logLevel] ?? 'info';
  return LEVELS.find((l) => l === raw) ?? 'info';
}

/**
 * Create the logger used when none is injected.
 *
 * @param level - pino level; defaults to MODELPACK_LOG_LEVEL, then "info"
 */
export function createLogger(level?: string): Logger {
  return pino({ name: 'modelpack', level: resolveLevel(level) }, process.stderr);
}
