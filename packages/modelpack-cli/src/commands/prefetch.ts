/**
 * modelpack prefetch: download and verify every file of a model.
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  addCommonOptions,
  createProcessContext,
  locateOptions,
  openPackage,
  runCommand,
} from '../utils/context.js';
import type { CliContext, CommonOptions } from '../utils/context.js';
import { progress, step, success } from '../utils/output.js';

export interface PrefetchOptions extends CommonOptions {
  force?: boolean;
  concurrency?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Prints each local path on stdout, primary file first.
 */
export async function runPrefetch(options: PrefetchOptions, ctx: CliContext): Promise<number> {
  return runCommand(ctx, async () => {
    const pkg = await openPackage(options, ctx);
    step(ctx.output, `Fetching ${pkg.manifest.files.length} file(s) for ${pkg.manifest.key}`);

    const files = await pkg.ensureFiles({
      ...locateOptions(options, ctx),
      token: options.token,
      forceRedownload: options.force ?? false,
      concurrency: options.concurrency,
      onProgress: (p) => progress(ctx.output, `${p.url}: ${p.message}`),
    });

    for (const localPath of files.files.values()) {
      ctx.output.result(localPath);
    }
    success(ctx.output, `${files.files.size} file(s) ready in ${files.modelDirectory}`);
  });
}

export function registerPrefetchCommand(program: Command): void {
  addCommonOptions(
    program
      .command('prefetch')
      .description('Download and verify all model files into the cache'),
  )
    .option('-f, --force', 'Download again even when a valid copy is cached')
    .option('--concurrency <n>', 'Files to download in parallel', parsePositiveInt)
    .action(async (options: PrefetchOptions) => {
      process.exitCode = await runPrefetch(options, createProcessContext(options.logLevel));
    });
}
