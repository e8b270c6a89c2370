/**
 * Terminal output. Results go to stdout, one per line, so they can be
 * piped; everything meant for a human goes to stderr.
 */

import chalk from 'chalk';

export interface Output {
  /** Primary result line (stdout) */
  result(line: string): void;

  /** Diagnostic line (stderr) */
  message(line: string): void;
}

export const processOutput: Output = {
  result: (line) => {
    process.stdout.write(`${line}\n`);
  },
  message: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export function success(output: Output, msg: string): void {
  output.message(chalk.green('  ✓') + ' ' + msg);
}

export function failure(output: Output, msg: string): void {
  output.message(chalk.red('  ✗') + ' ' + msg);
}

export function warn(output: Output, msg: string): void {
  output.message(chalk.yellow('  !') + ' ' + msg);
}

export function progress(output: Output, msg: string): void {
  output.message(chalk.dim('  ~') + ' ' + msg);
}

export function step(output: Output, msg: string): void {
  output.message(chalk.cyan('  →') + ' ' + msg);
}
