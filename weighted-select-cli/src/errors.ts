/**
 * Error classes for the wselect CLI
 */

/**
 * Validation error - for bad command-line input
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError';

  constructor(
    public readonly field: 'source' | 'weight' | 'limit',
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string | number
  ) {
    super(message);
  }
}

/**
 * Source read error - a file could not be opened or read while merging
 */
export class SourceReadError extends Error {
  public readonly name = 'SourceReadError';

  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Cannot read source ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
