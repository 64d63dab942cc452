/**
 * Sweep results: one entry per swept parameter, ordered by parameter.
 */

import type { ExecutionFailureKind } from './errors';
import type { MeasurementHistogram } from './histogram';
import type { MetricTriple } from './metrics';

export interface SucceededEntry {
  status: 'succeeded';
  index: number;
  parameter: number;
  attempts: number;
  metrics: MetricTriple;
  histogram: MeasurementHistogram;
}

export type FailureReason = 'execution' | 'invalid-histogram';

export interface EntryFailure {
  reason: FailureReason;
  /** Set when the reason is `execution` */
  kind?: ExecutionFailureKind;
  message: string;
}

export interface FailedEntry {
  status: 'failed';
  index: number;
  parameter: number;
  attempts: number;
  failure: EntryFailure;
}

/**
 * Parameter not run to completion because the sweep was aborted or halted
 */
export interface CancelledEntry {
  status: 'cancelled';
  index: number;
  parameter: number;
  attempts: number;
}

export type SweepEntry = SucceededEntry | FailedEntry | CancelledEntry;

export type SweepEntryStatus = SweepEntry['status'];

export interface SweepResult {
  shots: number;
  entries: readonly SweepEntry[];
  /** Present when a terminal failure or an abort stopped the sweep early */
  halted?: {
    cause: 'terminal-failure' | 'aborted';
    message: string;
  };
  startedAt: string;
  finishedAt: string;
}

export function successfulEntries(result: SweepResult): SucceededEntry[] {
  return result.entries.filter(
    (entry): entry is SucceededEntry => entry.status === 'succeeded'
  );
}

export function failedEntries(result: SweepResult): FailedEntry[] {
  return result.entries.filter(
    (entry): entry is FailedEntry => entry.status === 'failed'
  );
}

export function cancelledEntries(result: SweepResult): CancelledEntry[] {
  return result.entries.filter(
    (entry): entry is CancelledEntry => entry.status === 'cancelled'
  );
}

/**
 * `count` equally spaced values from `start` to `stop`, both included
 */
export function sweepParameters(
  start: number = 0.1,
  stop: number = 2.0,
  count: number = 8
): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`count must be a positive integer, got ${count}`);
  }
  if (count === 1) return [start];
  if (!(stop > start)) {
    throw new RangeError(`stop (${stop}) must be greater than start (${start})`);
  }
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) =>
    i === count - 1 ? stop : start + i * step
  );
}
