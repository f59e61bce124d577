/**
 * Core type definitions for the wselect CLI
 */

/**
 * One source given on the command line, before defaults are applied
 */
export interface SourceSpecInput {
  readonly path: string;
  readonly weight?: number;
}

/**
 * One source with its weight resolved
 */
export interface SourceSpec {
  readonly path: string;
  readonly weight: number;
}

/**
 * A line read from a source, tagged with the file it came from
 */
export interface MergedLine {
  readonly source: string; // file basename, used for --label
  readonly line: string;
}

/**
 * One row of `wselect plan` output
 */
export interface PlanRow {
  readonly path: string;
  readonly weight: number;
  readonly startAt: number;
  readonly prevStartAt: number;
}
