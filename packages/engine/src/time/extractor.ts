/**
 * Logweave Engine — Timestamp Extractor
 *
 * Turns an arbitrary log line into a comparable time of day.
 *
 * Guarantees:
 *   - extract() never throws; a line with no recognizable time returns the
 *     fallback it was given, unchanged (same object)
 *   - the first matcher (in set order) with an in-range occurrence wins
 *   - every result is normalized to nanoseconds; absent fraction digits are
 *     zero
 *   - an out-of-range occurrence (e.g. `25:61:00`) is skipped, never fatal;
 *     the search resumes one character after where it started, so an
 *     overlapping candidate (`99:10:11:12` → `10:11:12`) is still found
 */

import type { Timestamp } from '../types/timestamp.js';
import type { TimePrecision } from '../types/timestamp.js';
import { DEFAULT_TIME_MATCHERS } from './matchers.js';
import type { TimeMatcher } from './matchers.js';

/** A successful match: the time and the matcher that produced it. */
export interface TimeMatch {
  readonly time: Timestamp;
  readonly matcherId: string;
  readonly precision: TimePrecision;
}

export class TimestampExtractor {
  private readonly matchers: ReadonlyArray<TimeMatcher>;

  constructor(matchers: ReadonlyArray<TimeMatcher> = DEFAULT_TIME_MATCHERS) {
    // Own global copies: exec() below moves lastIndex.
    this.matchers = matchers.map((m) => ({
      id: m.id,
      precision: m.precision,
      pattern: new RegExp(m.pattern.source, m.pattern.flags.replace(/[gy]/g, '') + 'g'),
    }));
  }

  /** Returns undefined when no matcher finds an in-range time. */
  match(line: string): TimeMatch | undefined {
    for (const m of this.matchers) {
      const time = firstInRange(m.pattern, line);
      if (time !== undefined) {
        return { time, matcherId: m.id, precision: m.precision };
      }
    }
    return undefined;
  }

  extract(line: string, fallback: Timestamp): Timestamp {
    return this.match(line)?.time ?? fallback;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function firstInRange(pattern: RegExp, line: string): Timestamp | undefined {
  pattern.lastIndex = 0;
  for (let found = pattern.exec(line); found !== null; found = pattern.exec(line)) {
    const time = toTimestamp(found.groups);
    if (time !== undefined) return time;
    pattern.lastIndex = found.index + 1;
  }
  return undefined;
}

function toTimestamp(groups: Record<string, string> | undefined): Timestamp | undefined {
  if (groups === undefined) return undefined;
  const hour = toInt(groups['hh']);
  const minute = toInt(groups['mm']);
  const second = toInt(groups['ss']);
  if (hour === undefined || minute === undefined || second === undefined) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  return { hour, minute, second, nanos: fractionToNanos(groups['frac']) };
}

function toInt(digits: string | undefined): number | undefined {
  if (digits === undefined) return undefined;
  const n = Number.parseInt(digits, 10);
  return Number.isNaN(n) ? undefined : n;
}

/** `"002031"` → 2_031_000. Fractions longer than 9 digits are truncated. */
export function fractionToNanos(frac: string | undefined): number {
  if (frac === undefined || frac === '') return 0;
  return Number.parseInt(frac.slice(0, 9).padEnd(9, '0'), 10);
}
