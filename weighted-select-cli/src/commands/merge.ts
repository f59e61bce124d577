/**
 * Merge command implementation
 */

import { Command } from 'commander';
import { createMergeConfig } from '../config.js';
import { formatError, getExitCode } from '../formatting.js';
import { runMerge } from '../merge.js';
import { parseLimit, parseSourceSpec, parseWeight } from '../validation.js';

interface MergeOptions {
  defaultWeight: string;
  label?: boolean;
  limit?: string;
}

/**
 * Create the merge command
 */
export function createMergeCommand(): Command {
  const cmd = new Command('merge');

  cmd
    .description('Merge the lines of several files, interleaved by weight')
    .argument('<sources...>', 'Files to merge, each as path[:weight]')
    .option('-d, --default-weight <weight>', 'Weight for sources given without one', '1')
    .option('-l, --label', 'Prefix each line with its file name')
    .option('-n, --limit <count>', 'Stop after this many lines')
    .action(async (sources: string[], options: MergeOptions) => {
      try {
        // 1. Parse arguments
        const config = createMergeConfig({
          sources: sources.map(parseSourceSpec),
          defaultWeight: parseWeight(options.defaultWeight),
          label: options.label ?? false,
          limit: options.limit === undefined ? undefined : parseLimit(options.limit),
        });

        // 2. Merge and print
        await runMerge(config, (line) => console.log(line));

        process.exit(0);
      } catch (error) {
        console.error(formatError(error));
        process.exit(getExitCode(error));
      }
    });

  return cmd;
}
