/**
 * Shared types for the sampling and diffing model.
 */

import type { Sample } from './sample.js';

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ── Observations ──

/** Epoch milliseconds. */
export type Timestamp = number;

/** The (timestamp, value) half of a Sample once its Subject is split off. */
export interface Reading {
  timestamp: Timestamp;
  value: bigint;
}

/** Elapsed time and value change for one Subject between two snapshots. */
export interface Delta {
  /** Milliseconds between the older and newer reading */
  elapsed: number;
  /** newer.value - older.value, no wraparound correction */
  change: bigint;
}

/** Source of the observation instant; injectable so tests can pin time. */
export type Clock = () => Timestamp;

export const systemClock: Clock = () => Date.now();

// ── Probes ──

/** Produces the Samples for one data source. */
export interface Probe {
  readonly name: string;
  collect(): Promise<Sample[]>;
}

/**
 * What to do with a Subject present in the older snapshot but absent from
 * the newer one. `skip` diffs the intersection of both key sets; `error`
 * fails the whole diff.
 */
export type MissingSubjectPolicy = 'skip' | 'error';
