/**
 * modelpack info: show where each file comes from and where it is cached.
 */

import { Command } from 'commander';
import type { ModelInfo } from 'modelpack';
import {
  addCommonOptions,
  createProcessContext,
  locateOptions,
  openPackage,
  runCommand,
} from '../utils/context.js';
import type { CliContext, CommonOptions } from '../utils/context.js';

export interface InfoOptions extends CommonOptions {
  json?: boolean;
}

export function formatInfo(info: ModelInfo): string[] {
  return [
    `${info.modelId}@${info.revision} ${info.filePath}`,
    `  source:   ${info.sourceName} (${info.resolutionLevel})`,
    `  url:      ${info.url}`,
    `  path:     ${info.localPath}`,
    `  sha256:   ${info.sha256}`,
    `  size:     ${info.expectedBytes === null ? 'unknown' : `${info.expectedBytes} bytes`}`,
  ];
}

/** Resolves sources and paths only; nothing is downloaded or written */
export async function runInfo(options: InfoOptions, ctx: CliContext): Promise<number> {
  return runCommand(ctx, async () => {
    const pkg = await openPackage(options, ctx);
    const infos = await pkg.getFilesInfo(locateOptions(options, ctx));

    if (options.json) {
      ctx.output.result(JSON.stringify(infos, null, 2));
      return;
    }
    for (const info of infos) {
      for (const line of formatInfo(info)) {
        ctx.output.result(line);
      }
    }
  });
}

export function registerInfoCommand(program: Command): void {
  addCommonOptions(
    program.command('info').description('Show resolved source, URL and cache path for each file'),
  )
    .option('--json', 'Print machine-readable JSON')
    .action(async (options: InfoOptions) => {
      process.exitCode = await runInfo(options, createProcessContext(options.logLevel));
    });
}
