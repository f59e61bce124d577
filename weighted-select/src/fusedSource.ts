// Source adapter that stops polling a source once it has finished
// Wraps every source appended to a select builder

import { Poll } from './poll.js';
import type { PollSource, Waker } from './poll.js';
import { debugLog } from './utils/debug.js';

/**
 * Forwards polls to the wrapped source until it reports Completed or Failure,
 * then answers Completed without touching the source again
 */
export class FusedSource<T, E> implements PollSource<T, E> {
  private done = false;
  private closed = false;

  constructor(
    private readonly source: PollSource<T, E>,
    private readonly label: string = 'source'
  ) {}

  poll(waker: Waker): Poll<T, E> {
    if (this.done) {
      return Poll.completed();
    }

    const result = this.source.poll(waker);

    switch (result.type) {
      case 'Completed':
        this.done = true;
        debugLog(`${this.label} completed, fused`);
        break;
      case 'Failure':
        // The failure still goes out on this poll; later polls see Completed
        this.done = true;
        break;
      case 'Item':
      case 'NotReady':
        break;
    }

    return result;
  }

  /**
   * Whether the wrapped source has finished and will no longer be polled
   */
  isTerminated(): boolean {
    return this.done;
  }

  /**
   * Close the wrapped source once; afterwards the adapter reports Completed
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.done = true;
    debugLog(`${this.label} closed`);
    await this.source.close?.();
  }
}
