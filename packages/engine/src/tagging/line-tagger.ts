/**
 * Logweave Engine — Line Tagger
 *
 * Builds TaggedLines and renders them.
 *
 * Sort key string layout (34 characters, fields zero-padded, ':' and '.'
 * never occur inside a field):
 *
 *   D:HH:MM:SS.NNNNNNNNN:IIII:RRRRRRRR
 *   │ │        │         │    └ row number (8)
 *   │ │        │         └ source index (4)
 *   │ │        └ nanoseconds (9)
 *   │ └ hour, minute, second (2 each)
 *   └ day number (1)
 *
 * Display line layout:
 *
 *   HH:MM:SS.NNNNNNNNN [tag]<padding to 62 columns> raw line
 */

import type { SortKey, TaggedLine } from '../types/tagged-line.js';
import { LINE_ENCODING } from '../types/tagged-line.js';
import type { Timestamp } from '../types/timestamp.js';
import { compareTimestamps, formatTimestamp, pad } from '../types/timestamp.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Length of a formatSortKey() string. */
export const SORT_KEY_WIDTH = 34;

/** Names longer than this are shortened for the provenance tag. */
export const MAX_TAG_NAME_LENGTH = 60;
export const TAG_HEAD_LENGTH = 17;
export const TAG_TAIL_LENGTH = 40;
export const TAG_ELLIPSIS = '...';

/** Column width of the bracketed provenance tag. */
export const TAG_COLUMN_WIDTH = MAX_TAG_NAME_LENGTH + 2;

// ---------------------------------------------------------------------------
// Sort keys
// ---------------------------------------------------------------------------

/**
 * Total order over sort keys: day, time, source index, row number.
 * Consistent with plain string comparison of formatSortKey() output.
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a.dayNumber !== b.dayNumber) return a.dayNumber - b.dayNumber;
  const byTime = compareTimestamps(a.time, b.time);
  if (byTime !== 0) return byTime;
  if (a.sourceIndex !== b.sourceIndex) return a.sourceIndex - b.sourceIndex;
  return a.rowNumber - b.rowNumber;
}

export function formatSortKey(key: SortKey): string {
  return (
    `${key.dayNumber}:${formatTimestamp(key.time)}` +
    `:${pad(key.sourceIndex, 4)}:${pad(key.rowNumber, 8)}`
  );
}

// ---------------------------------------------------------------------------
// Provenance
// ---------------------------------------------------------------------------

/**
 * Shorten a display name to at most MAX_TAG_NAME_LENGTH characters by
 * keeping its head and tail around an ellipsis. Lengths count code points,
 * so a surrogate pair is never split.
 */
export function shortenName(name: string): string {
  const chars = Array.from(name);
  if (chars.length <= MAX_TAG_NAME_LENGTH) return name;
  return (
    chars.slice(0, TAG_HEAD_LENGTH).join('') +
    TAG_ELLIPSIS +
    chars.slice(chars.length - TAG_TAIL_LENGTH).join('')
  );
}

// ---------------------------------------------------------------------------
// Tagging
// ---------------------------------------------------------------------------

export interface TagInput {
  readonly dayNumber: 0 | 1;
  readonly time: Timestamp;
  readonly sourceIndex: number;
  readonly rowNumber: number;
  /** Already shortened, see shortenName(). */
  readonly provenanceTag: string;
  readonly rawLine: string;
}

export function tagLine(input: TagInput): TaggedLine {
  const key: SortKey = {
    dayNumber: input.dayNumber,
    time: input.time,
    sourceIndex: input.sourceIndex,
    rowNumber: input.rowNumber,
  };
  return {
    key,
    sortKey: formatSortKey(key),
    displayTime: formatTimestamp(input.time),
    provenanceTag: input.provenanceTag,
    rawLine: input.rawLine,
  };
}

/**
 * The line as emitted: display time, aligned tag, original bytes. The result
 * is a LINE_ENCODING byte string; the tag is UTF-8 encoded into it and
 * aligned by code points.
 */
export function renderLine(line: TaggedLine): string {
  const tag = `[${line.provenanceTag}]`;
  const padding = ' '.repeat(Math.max(0, TAG_COLUMN_WIDTH - Array.from(tag).length));
  const prefix = `${line.displayTime} ${tag}${padding} `;
  return Buffer.from(prefix, 'utf8').toString(LINE_ENCODING) + line.rawLine;
}
