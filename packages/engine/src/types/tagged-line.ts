/**
 * Logweave Engine — Tagged Line Types
 *
 * A TaggedLine is one output record: the original bytes of an input line
 * plus everything needed to place it in the merged order and to show where
 * it came from. TaggedLines are immutable once built.
 *
 * Line text is carried as a byte string in LINE_ENCODING: one character per
 * input byte, whatever the file's own encoding. Buffer.from(line,
 * LINE_ENCODING) gives back the exact input bytes.
 */

import type { Timestamp } from './timestamp.js';

export const LINE_ENCODING = 'latin1' satisfies BufferEncoding;

// ---------------------------------------------------------------------------
// Sort Key
// ---------------------------------------------------------------------------

/**
 * The composite ordering token of a line.
 *
 * Ordering is (dayNumber, time, sourceIndex, rowNumber). Because the pair
 * (sourceIndex, rowNumber) is unique within a run, two keys from distinct
 * lines never compare equal.
 */
export interface SortKey {
  /** 0 or 1. See RollingTimeState.dayNumber. */
  readonly dayNumber: number;
  readonly time: Timestamp;
  readonly sourceIndex: number;
  /** 1-based row within the source. */
  readonly rowNumber: number;
}

// ---------------------------------------------------------------------------
// Tagged Line
// ---------------------------------------------------------------------------

export interface TaggedLine {
  readonly key: SortKey;
  /**
   * Fixed-width string rendering of `key`
   * (`D:HH:MM:SS.NNNNNNNNN:IIII:RRRRRRRR`), for diagnostics and debugging
   * only. Merging orders by compareSortKeys() on `key`; plain string
   * comparison of two sortKeys gives the same order.
   */
  readonly sortKey: string;
  /** `HH:MM:SS.nnnnnnnnn` */
  readonly displayTime: string;
  /** Shortened source name, without brackets or padding. */
  readonly provenanceTag: string;
  /** The input line, unmodified, as a LINE_ENCODING byte string. */
  readonly rawLine: string;
}

// ---------------------------------------------------------------------------
// Rolling Time State
// ---------------------------------------------------------------------------

/**
 * Per-source state carried from line to line while scanning.
 *
 * Invariant: dayNumber never goes from 1 back to 0 within a source.
 */
export interface RollingTimeState {
  /** Time of the most recent matched line; fallback for unmatched lines. */
  currentTime: Timestamp;
  /** Time of the first matched line. Fixed once set. */
  firstTime: Timestamp | undefined;
  dayNumber: 0 | 1;
}
