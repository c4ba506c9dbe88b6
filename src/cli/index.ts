#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { registerReviewCommand } from './commands/review.command.js';

const program = new Command();

program
  .name('pr-lint-review')
  .description('Containerized static-analysis review for pull requests')
  .version('0.1.0');

registerReviewCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red.bold('❌ Unexpected error:'), error);
  process.exitCode = 1;
});
