// Host runtime for poll sources: drives polling from async code
// Suspends on NotReady until the source wakes us

import type { Poll, PollSource, Waker } from './poll.js';

/**
 * Waker that resolves a pending wait() or, if woken first, lets the next wait() pass straight through
 */
export class WakeSignal implements Waker {
  private woken = false;
  private resolveWait: (() => void) | null = null;

  wake(): void {
    this.woken = true;
    const resolve = this.resolveWait;
    this.resolveWait = null;
    resolve?.();
  }

  /**
   * Forget any earlier wake-up before polling again
   */
  reset(): void {
    this.woken = false;
  }

  /**
   * Resolve once wake() has been called since the last reset()
   */
  wait(): Promise<void> {
    if (this.woken) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.resolveWait = resolve;
    });
  }
}

/**
 * Consume a poll source as an async iterable
 *
 * Items are yielded in order, Completed ends the iteration and a Failure is
 * thrown as-is. The source is closed however the iteration ends, including
 * when the consumer breaks out early.
 */
export async function* drive<T, E>(source: PollSource<T, E>): AsyncGenerator<T, void, undefined> {
  const signal = new WakeSignal();

  try {
    while (true) {
      signal.reset();
      const result = source.poll(signal);

      switch (result.type) {
        case 'Item':
          yield result.value;
          break;
        case 'NotReady':
          await signal.wait();
          break;
        case 'Completed':
          return;
        case 'Failure':
          throw result.error;
      }
    }
  } finally {
    await source.close?.();
  }
}

/**
 * Drive a source to completion and gather its items
 */
export async function collect<T, E>(source: PollSource<T, E>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of drive(source)) {
    items.push(item);
  }
  return items;
}

/**
 * Poll synchronously until the source stops yielding items
 * Returns the items and the outcome that ended the run (NotReady, Completed or Failure)
 */
export function drainReady<T, E>(
  source: PollSource<T, E>,
  waker: Waker
): { items: T[]; outcome: Exclude<Poll<T, E>, { type: 'Item' }> } {
  const items: T[] = [];

  while (true) {
    const result = source.poll(waker);
    if (result.type !== 'Item') {
      return { items, outcome: result };
    }
    items.push(result.value);
  }
}
