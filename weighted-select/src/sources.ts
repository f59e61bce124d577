// Adapters turning ordinary iterables into poll sources

import { Poll } from './poll.js';
import type { PollSource, Waker } from './poll.js';

/**
 * Always-ready source over a synchronous iterable
 * Never returns NotReady or Failure; an exception from the iterator is thrown out of poll()
 */
export function fromIterable<T>(iterable: Iterable<T>): PollSource<T, never> {
  const iterator = iterable[Symbol.iterator]();

  return {
    poll: (): Poll<T, never> => {
      const result = iterator.next();
      return result.done === true ? Poll.completed() : Poll.item(result.value);
    },
    close: (): void => {
      iterator.return?.();
    },
  };
}

/**
 * Settled outcome of an in-flight next() call
 */
type Settled<T> =
  | { readonly kind: 'result'; readonly result: IteratorResult<T> }
  | { readonly kind: 'error'; readonly reason: unknown };

/**
 * Bridges an async iterable into the poll model
 *
 * The first poll starts a next() call and returns NotReady. When the call
 * settles, the most recent waker is woken and the next poll hands out the
 * value. A rejected next() becomes Failure, with the reason passed through mapError.
 */
export class AsyncIterableSource<T, E> implements PollSource<T, E> {
  private readonly iterator: AsyncIterator<T>;
  private pending: Promise<void> | null = null;
  private settled: Settled<T> | null = null;
  private waker: Waker | null = null;
  private finished = false;

  constructor(
    iterable: AsyncIterable<T>,
    private readonly mapError: (reason: unknown) => E
  ) {
    this.iterator = iterable[Symbol.asyncIterator]();
  }

  poll(waker: Waker): Poll<T, E> {
    const settled = this.settled;
    if (settled !== null) {
      this.settled = null;
      return this.toPoll(settled);
    }

    if (this.finished) {
      return Poll.completed();
    }

    // Remember the latest waker; the task polling us may have changed
    this.waker = waker;

    if (this.pending === null) {
      this.pending = this.iterator.next().then(
        (result) => this.settle({ kind: 'result', result }),
        (reason: unknown) => this.settle({ kind: 'error', reason })
      );
    }

    return Poll.notReady();
  }

  async close(): Promise<void> {
    if (this.finished) {
      return;
    }

    this.finished = true;
    this.settled = null;
    this.waker = null;
    await this.iterator.return?.();
  }

  private settle(settled: Settled<T>): void {
    this.pending = null;

    if (!this.finished) {
      this.settled = settled;
    }

    const waker = this.waker;
    this.waker = null;
    waker?.wake();
  }

  private toPoll(settled: Settled<T>): Poll<T, E> {
    if (settled.kind === 'error') {
      this.finished = true;
      return Poll.failure(this.mapError(settled.reason));
    }

    if (settled.result.done === true) {
      this.finished = true;
      return Poll.completed();
    }

    return Poll.item(settled.result.value);
  }
}

/**
 * Poll source over an async iterable
 * Failures carry the rejection reason, or whatever mapError turns it into
 */
export function fromAsyncIterable<T>(iterable: AsyncIterable<T>): PollSource<T, unknown>;
export function fromAsyncIterable<T, E>(
  iterable: AsyncIterable<T>,
  mapError: (reason: unknown) => E
): PollSource<T, E>;
export function fromAsyncIterable<T, E>(
  iterable: AsyncIterable<T>,
  mapError?: (reason: unknown) => E
): PollSource<T, unknown> {
  if (mapError === undefined) {
    return new AsyncIterableSource<T, unknown>(iterable, (reason) => reason);
  }
  return new AsyncIterableSource<T, E>(iterable, mapError);
}
