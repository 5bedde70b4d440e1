#!/usr/bin/env tsx

/**
 * detectloop CLI: closed-loop detection rule refinement.
 *
 * Usage:
 *   detectloop refine --input report.md --output ./rules/
 *   detectloop evaluate --input ./rules/ --report evaluation.json
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';

import { registerRefineCommand } from './commands/refine.js';
import { registerEvaluateCommand } from './commands/evaluate.js';
import { packageVersion } from './options.js';

const program = new Command();

program
  .name('detectloop')
  .description('Generate detection rules from threat intelligence and refine them against a search backend')
  .version(packageVersion());

registerRefineCommand(program);
registerEvaluateCommand(program);

// Global error handling
program.exitOverride();

const QUIET_EXIT_CODES = new Set(['commander.helpDisplayed', 'commander.version', 'commander.help']);

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    if (err instanceof CommanderError) {
      if (QUIET_EXIT_CODES.has(err.code)) return;
      // commander has already printed its own usage error
      process.exitCode = err.exitCode;
      return;
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "detectloop --help" for usage information.'));
    console.error('');
    process.exitCode = 1;
  }
}

void main();
