/**
 * Merging text files by weight
 */

import { drive, fromAsyncIterable, weightedSelect } from 'weighted-select';
import type { WeightedSelect } from 'weighted-select';
import type { MergeConfig } from './config.js';
import { SourceReadError } from './errors.js';
import { formatLine } from './formatting.js';
import { readTaggedLines } from './lineReader.js';
import type { MergedLine, PlanRow } from './types.js';

/**
 * Build a weighted select with one line source per configured file
 * Files are not opened until the select is first polled
 */
export function buildMergeSelect(config: MergeConfig): WeightedSelect<MergedLine, SourceReadError> {
  let builder = weightedSelect<MergedLine, SourceReadError>();

  for (const spec of config.sources) {
    const lines = fromAsyncIterable(
      readTaggedLines(spec.path),
      (reason) => new SourceReadError(spec.path, reason)
    );
    builder = builder.append(lines, spec.weight, spec.path);
  }

  return builder.finalize();
}

/**
 * Merge every configured file, passing each formatted line to write
 * Returns the number of lines written
 * @throws SourceReadError if a file cannot be read
 */
export async function runMerge(config: MergeConfig, write: (text: string) => void): Promise<number> {
  const select = buildMergeSelect(config);
  let count = 0;

  for await (const entry of drive(select)) {
    write(formatLine(entry, config.label));
    count++;

    if (config.limit !== undefined && count >= config.limit) {
      break;
    }
  }

  return count;
}

/**
 * Describe the lap layout for the configured files without reading them
 */
export async function planMerge(config: MergeConfig): Promise<{ rows: PlanRow[]; cycleLength: number }> {
  const select = buildMergeSelect(config);

  try {
    const rows = select.layout().map((segment) => ({
      path: segment.label,
      weight: segment.weight,
      startAt: segment.startAt,
      prevStartAt: segment.prevStartAt,
    }));
    return { rows, cycleLength: select.cycleLength() };
  } finally {
    await select.close();
  }
}
