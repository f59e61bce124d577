#!/usr/bin/env node

/**
 * wselect CLI - Main entry point
 */

import { Command } from 'commander';
import { createMergeCommand } from './commands/merge.js';
import { createPlanCommand } from './commands/plan.js';

/**
 * Main CLI program
 */
async function main(): Promise<void> {
  const program = new Command();

  program.name('wselect').version('0.1.0').description('wselect - merge text files line by line, interleaved by weight');

  // Register commands
  program.addCommand(createMergeCommand());
  program.addCommand(createPlanCommand());

  // Show help if no command provided
  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  // Parse arguments
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(3);
});
