/**
 * modelpack verify: re-hash cached files without touching the network.
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

/**
 * Prints each verified path on stdout. A file that fails verification
 * is deleted and the command stops there.
 */
export async function runVerify(options: CommonOptions, ctx: CliContext): Promise<number> {
  return runCommand(ctx, async () => {
    const pkg = await openPackage(options, ctx);
    const files = await pkg.verifyFiles(locateOptions(options, ctx));

    for (const [manifestPath, localPath] of files.files) {
      success(ctx.output, `${manifestPath} verified`);
      ctx.output.result(localPath);
    }
  });
}

export function registerVerifyCommand(program: Command): void {
  addCommonOptions(
    program.command('verify').description('Check cached files against the manifest digests'),
  ).action(async (options: CommonOptions) => {
    process.exitCode = await runVerify(options, createProcessContext(options.logLevel));
  });
}
