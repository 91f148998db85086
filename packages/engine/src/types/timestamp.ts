/**
 * Logweave Engine — Timestamp Types
 *
 * A Timestamp is a wall-clock time of day normalized to nanosecond
 * resolution. Log lines rarely carry a date that can be trusted, so the
 * engine compares times of day only; crossing midnight is handled by the
 * per-source day-rollover flag, not by the timestamp itself.
 */

// ---------------------------------------------------------------------------
// Timestamp
// ---------------------------------------------------------------------------

/**
 * A time of day with nanosecond resolution.
 *
 * Invariants:
 * - 0 <= hour <= 23, 0 <= minute <= 59, 0 <= second <= 59
 * - 0 <= nanos <= 999_999_999
 * - Missing lower-order fraction digits are zero (a millisecond match
 *   `.002` has nanos = 2_000_000)
 */
export interface Timestamp {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nanos: number;
}

/**
 * Precision of the pattern a timestamp was matched with.
 * Informational only; all timestamps compare at nanosecond resolution.
 */
export enum TimePrecision {
  Second = 'second',
  Milli = 'milli',
  Micro = 'micro',
  Nano = 'nano',
}

/** The fallback every source starts from: 00:00:00.000000000. */
export const ZERO_TIMESTAMP: Timestamp = Object.freeze({
  hour: 0,
  minute: 0,
  second: 0,
  nanos: 0,
});

/**
 * Total order over timestamps: hour, minute, second, nanos.
 * Returns a negative number, zero, or a positive number.
 */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  if (a.hour !== b.hour) return a.hour - b.hour;
  if (a.minute !== b.minute) return a.minute - b.minute;
  if (a.second !== b.second) return a.second - b.second;
  return a.nanos - b.nanos;
}

/** `HH:MM:SS.nnnnnnnnn` */
export function formatTimestamp(ts: Timestamp): string {
  return (
    `${pad(ts.hour, 2)}:${pad(ts.minute, 2)}:${pad(ts.second, 2)}` +
    `.${pad(ts.nanos, 9)}`
  );
}

export function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
