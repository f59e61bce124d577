// Merge configuration with validation and defaults
// Plain object configuration: input with optional fields, resolved by createMergeConfig

import { ValidationError } from './errors.js';
import type { SourceSpec, SourceSpecInput } from './types.js';
import { validateWeightValue } from './validation.js';

/**
 * Merge configuration
 */
export interface MergeConfig {
  readonly sources: ReadonlyArray<SourceSpec>;
  readonly defaultWeight: number; // applied to sources given without :weight, default 1
  readonly label: boolean; // prefix each line with its file name, default false
  readonly limit?: number; // stop after this many lines
}

/**
 * Default configuration values
 */
export const DEFAULT_WEIGHT = 1;

/**
 * Partial merge configuration (user-provided)
 * All fields are optional except sources
 */
export interface MergeConfigInput {
  readonly sources: ReadonlyArray<SourceSpecInput>;
  readonly defaultWeight?: number;
  readonly label?: boolean;
  readonly limit?: number;
}

/**
 * Validate merge configuration
 * Throws synchronous error if invalid
 */
export function validateMergeConfig(config: MergeConfig): void {
  if (config.sources.length === 0) {
    throw new ValidationError('source', 'At least one source is required');
  }

  validateWeightValue(config.defaultWeight);

  for (const source of config.sources) {
    if (source.path.length === 0) {
      throw new ValidationError('source', 'Source path cannot be empty');
    }
    validateWeightValue(source.weight);
  }

  if (config.limit !== undefined && (!Number.isSafeInteger(config.limit) || config.limit < 1)) {
    throw new ValidationError('limit', 'Limit must be a positive integer', config.limit, '>= 1');
  }
}

/**
 * Create a complete MergeConfig from partial input
 * Applies defaults for missing values
 */
export function createMergeConfig(input: MergeConfigInput): MergeConfig {
  const defaultWeight = input.defaultWeight ?? DEFAULT_WEIGHT;

  const config: MergeConfig = {
    sources: input.sources.map((source) => ({
      path: source.path,
      weight: source.weight ?? defaultWeight,
    })),
    defaultWeight,
    label: input.label ?? false,
    limit: input.limit,
  };

  // Validate before returning
  validateMergeConfig(config);

  return config;
}
