/**
 * Plan command implementation
 */

import { Command } from 'commander';
import { createMergeConfig } from '../config.js';
import { formatCycle, formatError, formatPlanRow, getExitCode } from '../formatting.js';
import { planMerge } from '../merge.js';
import { parseSourceSpec, parseWeight } from '../validation.js';

/**
 * Create the plan command
 */
export function createPlanCommand(): Command {
  const cmd = new Command('plan');

  cmd
    .description('Show the slot window each source owns in one lap, without reading the files')
    .argument('<sources...>', 'Files to merge, each as path[:weight]')
    .option('-d, --default-weight <weight>', 'Weight for sources given without one', '1')
    .action(async (sources: string[], options: { defaultWeight: string }) => {
      try {
        const config = createMergeConfig({
          sources: sources.map(parseSourceSpec),
          defaultWeight: parseWeight(options.defaultWeight),
        });

        const plan = await planMerge(config);
        for (const row of plan.rows) {
          console.log(formatPlanRow(row));
        }
        console.log(formatCycle(plan.cycleLength));

        process.exit(0);
      } catch (error) {
        console.error(formatError(error));
        process.exit(getExitCode(error));
      }
    });

  return cmd;
}
