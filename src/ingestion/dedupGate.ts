import type { ReadingValues } from '../repositories/types';

export const DEDUP_COMPARISON_FIELDS: readonly (keyof ReadingValues)[] = [
  'temperature',
  'humidity',
  'gas',
  'luminosityAlert',
  'lux'
];

export const DEFAULT_MIN_INTERVAL_MS = 5 * 60 * 60 * 1000;

export type DedupReason = 'first' | 'changed' | 'interval_elapsed' | 'duplicate';

export interface DedupDecision {
  accepted: boolean;
  reason: DedupReason;
  elapsedMs: number | null;
}

type ComparableReading = ReadingValues & { timestamp: Date };

export function hasSameValues(previous: ReadingValues, current: ReadingValues): boolean {
  // Exact equality: sensors report quantized values. null vs a number counts as a change.
  return DEDUP_COMPARISON_FIELDS.every(field => previous[field] === current[field]);
}

/**
 * Suppresses a reading that repeats the last stored one within the minimum interval.
 * The read-then-decide sequence is not serialized against concurrent writers, so two
 * overlapping cycles may both accept the same reading.
 */
export class DeduplicationGate {
  constructor(private readonly minIntervalMs: number = DEFAULT_MIN_INTERVAL_MS) {}

  evaluate(current: ComparableReading, previous: ComparableReading | null): DedupDecision {
    if (!previous) {
      return { accepted: true, reason: 'first', elapsedMs: null };
    }

    const elapsedMs = current.timestamp.getTime() - previous.timestamp.getTime();
    if (!hasSameValues(previous, current)) {
      return { accepted: true, reason: 'changed', elapsedMs };
    }

    if (elapsedMs >= this.minIntervalMs) {
      return { accepted: true, reason: 'interval_elapsed', elapsedMs };
    }
    return { accepted: false, reason: 'duplicate', elapsedMs };
  }
}
