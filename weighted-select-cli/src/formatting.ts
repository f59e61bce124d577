/**
 * Output formatting utilities
 */

import { InvalidWeightError } from 'weighted-select';
import { ValidationError, SourceReadError } from './errors.js';
import type { MergedLine, PlanRow } from './types.js';

/**
 * Format one merged line for output
 * With label on: "[file.txt] text"
 */
export function formatLine(entry: MergedLine, label: boolean): string {
  return label ? `[${entry.source}] ${entry.line}` : entry.line;
}

/**
 * Format one plan row
 * Format: path weight=W window=[START, END)
 */
export function formatPlanRow(row: PlanRow): string {
  return `${row.path} weight=${row.weight} window=[${row.startAt}, ${row.prevStartAt})`;
}

/**
 * Format the closing line of a plan
 */
export function formatCycle(cycleLength: number): string {
  return `cycle=${cycleLength}`;
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (not handled here)
 * - 1: Validation error (bad user input)
 * - 2: A source file could not be read
 * - 3: Anything else
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ValidationError || error instanceof InvalidWeightError) {
    return 1;
  }

  if (error instanceof SourceReadError) {
    return 2;
  }

  return 3;
}
