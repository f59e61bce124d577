/**
 * Input validation and parsing of command-line arguments
 */

import { InvalidWeightError, validateWeight } from 'weighted-select';
import { ValidationError } from './errors.js';
import type { SourceSpecInput } from './types.js';

const DIGITS = /^[0-9]+$/;
const NUMERIC_LOOKING = /^[-+.0-9]+$/;

/**
 * Checks that a number is a usable weight, by the library's own rule
 * @throws ValidationError if weight is not a positive integer
 */
export function validateWeightValue(weight: number): void {
  try {
    validateWeight(weight);
  } catch (error) {
    if (error instanceof InvalidWeightError) {
      throw new ValidationError('weight', 'Weight must be a positive integer', weight, '>= 1');
    }
    throw error;
  }
}

/**
 * Parses a weight given as text
 * @throws ValidationError if the text is not a positive integer
 */
export function parseWeight(value: string): number {
  const trimmed = value.trim();

  if (!DIGITS.test(trimmed)) {
    throw new ValidationError('weight', `Invalid weight: ${value}. Expected a positive integer`);
  }

  const weight = parseInt(trimmed, 10);
  validateWeightValue(weight);
  return weight;
}

/**
 * Parses the --limit option
 * @throws ValidationError if the text is not a positive integer
 */
export function parseLimit(value: string): number {
  const trimmed = value.trim();

  if (!DIGITS.test(trimmed)) {
    throw new ValidationError('limit', `Invalid limit: ${value}. Expected a positive integer`);
  }

  const limit = parseInt(trimmed, 10);
  if (limit < 1) {
    throw new ValidationError('limit', 'Limit must be a positive integer', limit, '>= 1');
  }
  return limit;
}

/**
 * Parses a source argument
 * Format: "path" or "path:weight"
 * A suffix after the last colon is read as the weight only when it looks like a number
 * @throws ValidationError if the path is empty or the weight is invalid
 */
export function parseSourceSpec(input: string): SourceSpecInput {
  const separator = input.lastIndexOf(':');
  let path = input;
  let weight: number | undefined;

  if (separator >= 0) {
    const suffix = input.slice(separator + 1);
    if (NUMERIC_LOOKING.test(suffix)) {
      path = input.slice(0, separator);
      weight = parseWeight(suffix);
    }
  }

  if (path.trim().length === 0) {
    throw new ValidationError('source', `Invalid source: ${input}. Expected: path[:weight]`);
  }

  return weight === undefined ? { path } : { path, weight };
}
