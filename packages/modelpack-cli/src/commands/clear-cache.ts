/**
 * modelpack clear-cache: delete a model's cached files.
 */

import { Command } from 'commander';
import {
  addCommonOptions,
  createProcessContext,
  locateOptions,
  openPackage,
  runCommand,
} from '../utils/context.js';
import type { CliContext, CommonOptions } from '../utils/context.js';
import { success } from '../utils/output.js';

export async function runClearCache(options: CommonOptions, ctx: CliContext): Promise<number> {
  return runCommand(ctx, async () => {
    const pkg = await openPackage(options, ctx);
    const removed = await pkg.clearCache(locateOptions(options, ctx));

    for (const localPath of removed) {
      ctx.output.result(localPath);
    }
    success(ctx.output, `Removed ${removed.length} file(s)`);
  });
}

export function registerClearCacheCommand(program: Command): void {
  addCommonOptions(
    program.command('clear-cache').description("Delete the model's cached files"),
  ).action(async (options: CommonOptions) => {
    process.exitCode = await runClearCache(options, createProcessContext(options.logLevel));
  });
}
