// Public API exports for weighted-select
// Main entry point for the library

// Builder and merge engine
export { SelectBuilder, weightedSelect, validateWeight } from './builder.js';
export { WeightedSelect } from './select.js';
export type { SegmentLayout } from './segment.js';

// Poll vocabulary
export { Poll, noopWaker } from './poll.js';
export type { PollItem, PollNotReady, PollCompleted, PollFailure, PollSource, Waker } from './poll.js';

// Sources
export { FusedSource } from './fusedSource.js';
export { fromIterable, fromAsyncIterable, AsyncIterableSource } from './sources.js';

// Driving from async code
export { drive, collect, drainReady, WakeSignal } from './driver.js';

// Error types
export { WeightedSelectError, InvalidWeightError, BuilderConsumedError, InvalidLayoutError } from './errors.js';
