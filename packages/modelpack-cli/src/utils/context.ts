/**
 * Shared plumbing for commands: options common to every command,
 * the runtime context, and error reporting.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { CancelledError, ModelPackError, ModelPackage, createLogger, normalizeError } from 'modelpack';
import type { FetchLike, LocateOptions, RuntimeConfig } from 'modelpack';
import type { Logger } from 'pino';
import { EXIT_SUCCESS, UsageError, exitCodeFor } from './exit-codes.js';
import { failure, processOutput, warn } from './output.js';
import type { Output } from './output.js';

export interface CommonOptions {
  manifest: string;
  source?: string;
  cacheDir?: string;
  token?: string;
  logLevel?: string;
}

export interface CliContext {
  output: Output;
  logger: Logger;
  signal?: AbortSignal;

  /** Injected in tests */
  fetch?: FetchLike;
  config?: Partial<RuntimeConfig>;
}

/** Attach the options every command takes */
export function addCommonOptions(command: Command): Command {
  return command
    .requiredOption('-m, --manifest <path>', 'Path to the model manifest JSON file')
    .option('-s, --source <name|url>', 'Source name, or an http(s):// or file:// URL')
    .option('-c, --cache-dir <path>', 'Cache root (default: MODELPACK_CACHE_DIR or the user cache directory)')
    .option('-t, --token <token>', 'Bearer token for HTTP sources (default: HF_TOKEN)')
    .option('--log-level <level>', 'Log level: fatal, error, warn, info, debug, trace or silent');
}

/**
 * Context for a real process: logs to stderr, aborts on Ctrl-C.
 * The CLI logs at warn unless told otherwise; progress has its own lines.
 */
export function createProcessContext(logLevel?: string): CliContext {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
  });
  return {
    output: processOutput,
    logger: createLogger(logLevel ?? process.env['MODELPACK_LOG_LEVEL'] ?? 'warn'),
    signal: controller.signal,
  };
}

/**
 * Load the package for the manifest named on the command line.
 *
 * @throws UsageError when the manifest file does not exist
 */
export async function openPackage(options: CommonOptions, ctx: CliContext): Promise<ModelPackage> {
  const manifestPath = path.resolve(options.manifest);
  if (!fs.existsSync(manifestPath)) {
    throw new UsageError(`Manifest file not found: ${manifestPath}`);
  }
  return ModelPackage.fromManifestFile(manifestPath, {
    logger: ctx.logger,
    fetch: ctx.fetch,
    config: ctx.config,
  });
}

export function locateOptions(options: CommonOptions, ctx: CliContext): LocateOptions {
  return { source: options.source, cacheDir: options.cacheDir, signal: ctx.signal };
}

/**
 * Run a command body and turn its outcome into an exit code.
 * Errors are reported on stderr, never thrown.
 */
export async function runCommand(ctx: CliContext, body: () => Promise<void>): Promise<number> {
  try {
    await body();
    return EXIT_SUCCESS;
  } catch (err) {
    const normalized = normalizeError(err);
    if (normalized instanceof CancelledError) {
      warn(ctx.output, 'Cancelled');
    } else if (normalized instanceof ModelPackError || normalized instanceof UsageError) {
      failure(ctx.output, normalized.message);
    } else {
      const message = normalized instanceof Error ? normalized.message : String(normalized);
      failure(ctx.output, `Unexpected error: ${message}`);
      ctx.logger.error({ err: normalized }, 'Unexpected error');
    }
    return exitCodeFor(normalized);
  }
}
