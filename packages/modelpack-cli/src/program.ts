import { Command } from 'commander';
import { VERSION } from 'modelpack';
import { registerClearCacheCommand } from './commands/clear-cache.js';
import { registerInfoCommand } from './commands/info.js';
import { registerPrefetchCommand } from './commands/prefetch.js';
import { registerVerifyCommand } from './commands/verify.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('modelpack')
    .description('Fetch, verify and cache model files declared in a manifest')
    .version(VERSION);

  registerPrefetchCommand(program);
  registerVerifyCommand(program);
  registerInfoCommand(program);
  registerClearCacheCommand(program);

  return program;
}
