/**
 * CLI output helpers. Records go to stdout through the LevelLogger;
 * these only print the command's own verdict.
 */

import chalk from 'chalk';

export const output = {
  ok: (message: string) => {
    console.log(chalk.green('✓'), message);
  },

  fail: (message: string) => {
    console.error(chalk.red('✗'), message);
  },

  note: (label: string, value: string) => {
    console.log(chalk.dim(`  ${label}:`), value);
  },
};
