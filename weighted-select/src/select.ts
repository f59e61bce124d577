// Merge engine: polls weighted segments in round-robin order by weight
// Created only by SelectBuilder.finalize()

import { InvalidLayoutError } from './errors.js';
import { Poll } from './poll.js';
import type { PollSource, Waker } from './poll.js';
import type { SegmentLayout, WeightedSegment } from './segment.js';
import { debugLog } from './utils/debug.js';

/**
 * Result of one walk over the segments: where the cursor goes next and what to report
 */
interface WalkResult<T, E> {
  readonly cursor: number;
  readonly outcome: Poll<T, E>;
}

/**
 * Combined source over every appended segment
 *
 * One lap is `cycleLength` slots long and segment i owns the slots
 * [startAt, prevStartAt). The cursor says how far into the current lap we are.
 * A segment that is stalled or exhausted gives its remaining slots to the next
 * segment in append order within the same poll.
 */
export class WeightedSelect<T, E> implements PollSource<T, E> {
  private cursor = 0;

  /**
   * @throws InvalidLayoutError unless the segment windows start at 0, follow each
   * other without gaps and add up to the cycle length (1 when there are none)
   */
  constructor(
    private readonly segments: ReadonlyArray<WeightedSegment<T, E>>,
    private readonly cycle: number
  ) {
    checkLayout(segments, cycle);
  }

  /**
   * Poll the segment owed output next
   * Failures from a source are returned unchanged on this call
   */
  poll(waker: Waker): Poll<T, E> {
    let result = this.walk(this.cursor, waker);

    // Restart from the first segment so one poll can cover the rest of the lap
    if (Poll.producedNothing(result.outcome) && this.cursor > 0) {
      result = this.walk(0, waker);
    }

    this.cursor = result.cursor % this.cycle;
    return result.outcome;
  }

  /**
   * Close every owned source
   */
  async close(): Promise<void> {
    debugLog(`closing select with ${this.segments.length} segment(s)`);
    await Promise.all(this.segments.map((segment) => segment.source.close()));
  }

  /**
   * Sum of all weights (1 when nothing was appended)
   */
  cycleLength(): number {
    return this.cycle;
  }

  /**
   * Current position within the lap
   */
  position(): number {
    return this.cursor;
  }

  /**
   * Segment windows in append order
   */
  layout(): SegmentLayout[] {
    return this.segments.map((segment, index) => ({
      index,
      label: segment.label,
      weight: segment.weight,
      startAt: segment.startAt,
      prevStartAt: segment.prevStartAt,
    }));
  }

  /**
   * Walk from the segment whose window holds the cursor up to the last-appended one
   *
   * Segments before that one are out of this walk: their windows already passed
   * in this lap. Each segment is polled in turn until one yields an item or a
   * failure. `lowerExhausted` tracks whether every segment polled so far, going
   * back to the start of the lap, has completed.
   */
  private walk(cursor: number, waker: Waker): WalkResult<T, E> {
    if (this.segments.length === 0) {
      return { cursor: 0, outcome: Poll.completed() };
    }

    let index = this.segments.length - 1;
    while (cursor < this.segments[index]!.startAt) {
      index--;
    }

    let position = cursor;
    let lowerExhausted = cursor === 0;

    for (; index < this.segments.length; index++) {
      const segment = this.segments[index]!;
      const outcome = segment.source.poll(waker);

      if (outcome.type === 'Item' || outcome.type === 'Failure') {
        return { cursor: position + 1, outcome };
      }

      lowerExhausted = outcome.type === 'Completed' && lowerExhausted;
      position = segment.prevStartAt;
    }

    return {
      cursor: position,
      outcome: lowerExhausted ? Poll.completed() : Poll.notReady(),
    };
  }
}

function checkLayout<T, E>(segments: ReadonlyArray<WeightedSegment<T, E>>, cycle: number): void {
  let expectedStart = 0;

  segments.forEach((segment, index) => {
    const { weight, startAt, prevStartAt } = segment;
    if (!Number.isSafeInteger(weight) || weight < 1 || startAt !== expectedStart || prevStartAt !== startAt + weight) {
      throw new InvalidLayoutError(
        `Segment ${index} has window [${startAt}, ${prevStartAt}) with weight ${weight}, expected it to start at ${expectedStart}`
      );
    }
    expectedStart = prevStartAt;
  });

  const expectedCycle = expectedStart > 0 ? expectedStart : 1;
  if (cycle !== expectedCycle) {
    throw new InvalidLayoutError(`Cycle length ${cycle} does not match cumulative weight, expected ${expectedCycle}`);
  }
}
