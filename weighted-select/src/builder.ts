// Incremental builder for a weighted select
// Each append consumes the previous builder value and returns a new one

import { BuilderConsumedError, InvalidWeightError } from './errors.js';
import { FusedSource } from './fusedSource.js';
import type { PollSource } from './poll.js';
import type { WeightedSegment } from './segment.js';
import { WeightedSelect } from './select.js';
import { debugLog } from './utils/debug.js';

/**
 * Ordered chain of weighted segments under construction
 *
 * Segments are kept in append order: the first appended source has the highest
 * priority within each lap. A builder value is single-use, so no two builders
 * ever share a segment list that one of them could still grow.
 */
export class SelectBuilder<T, E> {
  private consumed = false;

  private constructor(
    private readonly segments: ReadonlyArray<WeightedSegment<T, E>>,
    private readonly totalWeight: number
  ) {}

  /**
   * Builder with no segments and a cumulative weight of 0
   */
  static empty<T, E>(): SelectBuilder<T, E> {
    return new SelectBuilder<T, E>([], 0);
  }

  /**
   * Register a source with the given weight
   * The label only shows up in layout() and debug logs
   * @throws InvalidWeightError if weight is not a positive integer
   * @throws BuilderConsumedError if this builder was already used
   */
  append(source: PollSource<T, E>, weight: number, label?: string): SelectBuilder<T, E> {
    this.ensureNotConsumed('append');
    validateWeight(weight);

    const startAt = this.totalWeight;
    const prevStartAt = startAt + weight;

    if (prevStartAt > Number.MAX_SAFE_INTEGER) {
      throw new InvalidWeightError(
        weight,
        `Cumulative weight ${startAt} + ${weight} exceeds ${Number.MAX_SAFE_INTEGER}`
      );
    }

    const index = this.segments.length;
    const name = label ?? `segment ${index}`;
    const segment: WeightedSegment<T, E> = {
      source: new FusedSource(source, name),
      label: name,
      weight,
      startAt,
      prevStartAt,
    };

    this.consumed = true;
    debugLog(`appended segment ${index}: weight=${weight} window=[${startAt}, ${prevStartAt})`);

    return new SelectBuilder([...this.segments, segment], prevStartAt);
  }

  /**
   * Fix the cycle length and hand the segments over to a merge engine
   * @throws BuilderConsumedError if this builder was already used
   */
  finalize(): WeightedSelect<T, E> {
    this.ensureNotConsumed('finalize');
    this.consumed = true;

    // An empty chain still needs a non-zero modulus for the cursor
    const cycleLength = this.totalWeight > 0 ? this.totalWeight : 1;
    debugLog(`finalized ${this.segments.length} segment(s), cycle length ${cycleLength}`);

    return new WeightedSelect(this.segments, cycleLength);
  }

  /**
   * Number of segments appended so far
   */
  size(): number {
    return this.segments.length;
  }

  /**
   * Sum of all weights appended so far
   */
  cumulativeWeight(): number {
    return this.totalWeight;
  }

  /**
   * Whether append() or finalize() has already been called on this value
   */
  isConsumed(): boolean {
    return this.consumed;
  }

  private ensureNotConsumed(operation: 'append' | 'finalize'): void {
    if (this.consumed) {
      throw new BuilderConsumedError(operation);
    }
  }
}

/**
 * Check that a weight is usable
 * @throws InvalidWeightError for zero, negative, fractional or non-finite weights
 */
export function validateWeight(weight: number): void {
  if (!Number.isSafeInteger(weight) || weight < 1) {
    throw new InvalidWeightError(weight);
  }
}

/**
 * Start an empty builder for sources sharing item type T and failure type E
 */
export function weightedSelect<T, E = unknown>(): SelectBuilder<T, E> {
  return SelectBuilder.empty<T, E>();
}
