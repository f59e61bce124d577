// Poll vocabulary shared by every source and by the merge engine
// A poll never suspends: it reports one of four outcomes and, when not ready, relies on the waker

/**
 * Outcome of a single non-blocking poll
 * Uses discriminated union so callers switch on `type`
 */
export type Poll<T, E> = PollItem<T> | PollNotReady | PollCompleted | PollFailure<E>;

/**
 * Item: the source produced a value
 */
export interface PollItem<T> {
  readonly type: 'Item';
  readonly value: T;
}

/**
 * NotReady: nothing available yet; the source will call the waker it was given
 */
export interface PollNotReady {
  readonly type: 'NotReady';
}

/**
 * Completed: the source will never produce another item
 */
export interface PollCompleted {
  readonly type: 'Completed';
}

/**
 * Failure: the source reported an error value
 */
export interface PollFailure<E> {
  readonly type: 'Failure';
  readonly error: E;
}

const NOT_READY: PollNotReady = { type: 'NotReady' };
const COMPLETED: PollCompleted = { type: 'Completed' };

export const Poll = {
  item: <T>(value: T): PollItem<T> => ({ type: 'Item', value }),
  notReady: (): PollNotReady => NOT_READY,
  completed: (): PollCompleted => COMPLETED,
  failure: <E>(error: E): PollFailure<E> => ({ type: 'Failure', error }),
  producedNothing: <T, E>(poll: Poll<T, E>): poll is PollNotReady | PollCompleted =>
    poll.type === 'NotReady' || poll.type === 'Completed',
};

/**
 * Wake-up handle passed down with every poll
 * A source that returns NotReady must arrange for wake() to be called once it can make progress
 */
export interface Waker {
  wake(): void;
}

/**
 * Waker that does nothing, for callers that re-poll on their own schedule
 */
export const noopWaker: Waker = {
  wake: () => {},
};

/**
 * Single-operation capability implemented by every source the engine can merge
 */
export interface PollSource<T, E> {
  /**
   * Poll once without blocking
   */
  poll(waker: Waker): Poll<T, E>;

  /**
   * Release the source (e.g. return() an async iterator)
   * Called at most once, when the owning engine is closed
   */
  close?(): void | Promise<void>;
}
