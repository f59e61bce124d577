// Custom error classes for the weighted select combinator
// Extends Error with type-safe error hierarchy

/**
 * Base error class for all weighted select errors
 */
export class WeightedSelectError extends Error {
  public override readonly name: string = 'WeightedSelectError';

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid weight - thrown synchronously from append()
 * A caller bug, not a runtime condition: not meant to be caught and retried
 */
export class InvalidWeightError extends WeightedSelectError {
  public override readonly name: string = 'InvalidWeightError';
  public readonly weight: number;

  constructor(weight: number, message?: string) {
    super(message ?? `Weight must be a positive integer, got ${weight}`);
    this.weight = weight;
  }
}

/**
 * Builder reuse - thrown when append() or finalize() is called on a builder value
 * that an earlier append() or finalize() already consumed
 */
export class BuilderConsumedError extends WeightedSelectError {
  public override readonly name: string = 'BuilderConsumedError';
  public readonly operation: 'append' | 'finalize';

  constructor(operation: 'append' | 'finalize') {
    super(`Cannot ${operation}: builder was already consumed`);
    this.operation = operation;
  }
}

/**
 * Inconsistent segment layout - thrown when a merge engine is constructed from
 * windows that do not tile [0, cycleLength) in append order
 */
export class InvalidLayoutError extends WeightedSelectError {
  public override readonly name: string = 'InvalidLayoutError';
}
