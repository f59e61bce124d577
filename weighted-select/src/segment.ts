// Weighted segment: one registered source and its window within a lap

import type { FusedSource } from './fusedSource.js';

/**
 * A source together with its weight and the [startAt, prevStartAt) slot range it owns in each lap
 */
export interface WeightedSegment<T, E> {
  readonly source: FusedSource<T, E>;
  readonly label: string;
  readonly weight: number;
  readonly startAt: number; // cumulative weight of every segment appended before this one
  readonly prevStartAt: number; // startAt + weight, equal to the next segment's startAt
}

/**
 * Public, source-free view of a segment
 */
export interface SegmentLayout {
  readonly index: number;
  readonly label: string;
  readonly weight: number;
  readonly startAt: number;
  readonly prevStartAt: number;
}
