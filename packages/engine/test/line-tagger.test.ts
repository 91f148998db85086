/**
 * Logweave Engine — Line Tagger Tests
 *
 *   TAG-U1: sort key string is fixed-width and laid out field by field
 *   TAG-U2: string order of sort keys equals compareSortKeys() order
 *   TAG-U3: long provenance names are shortened to head + '...' + tail, by code point
 *   TAG-U4: rendered lines align the tag to a fixed column and keep raw bytes
 */

import { describe, it, expect } from 'vitest';
import {
  SORT_KEY_WIDTH,
  TAG_COLUMN_WIDTH,
  compareSortKeys,
  formatSortKey,
  renderLine,
  shortenName,
  tagLine,
} from '../src/tagging/line-tagger.js';
import type { SortKey } from '../src/types/tagged-line.js';
import { LINE_ENCODING } from '../src/types/tagged-line.js';

function key(
  dayNumber: number,
  hour: number,
  minute: number,
  second: number,
  nanos: number,
  sourceIndex: number,
  rowNumber: number,
): SortKey {
  return { dayNumber, time: { hour, minute, second, nanos }, sourceIndex, rowNumber };
}

// ---------------------------------------------------------------------------
// TAG-U1
// ---------------------------------------------------------------------------

describe('LineTagger — TAG-U1: sort key layout', () => {
  it('zero-pads every field', () => {
    const s = formatSortKey(key(0, 22, 10, 34, 2031000, 3, 42));
    expect(s).toBe('0:22:10:34.002031000:0003:00000042');
    expect(s).toHaveLength(SORT_KEY_WIDTH);
  });

  it('keeps the width constant for small and large values', () => {
    expect(formatSortKey(key(0, 0, 0, 0, 0, 0, 1))).toHaveLength(SORT_KEY_WIDTH);
    expect(formatSortKey(key(1, 23, 59, 59, 999999999, 9999, 99999999))).toHaveLength(SORT_KEY_WIDTH);
  });
});

// ---------------------------------------------------------------------------
// TAG-U2
// ---------------------------------------------------------------------------

describe('LineTagger — TAG-U2: ordering', () => {
  const keys: SortKey[] = [
    key(1, 0, 30, 0, 0, 0, 5),
    key(0, 23, 59, 59, 999999999, 1, 2),
    key(0, 9, 59, 59, 999999000, 1, 1),
    key(0, 10, 0, 0, 1000, 0, 1),
    key(0, 10, 0, 0, 1000, 0, 2),
    key(0, 10, 0, 0, 1000, 2, 1),
    key(0, 10, 0, 0, 999, 5, 9),
    key(0, 0, 0, 0, 0, 10, 1),
  ];

  it('orders by day, time, source index, then row number', () => {
    const sorted = [...keys].sort(compareSortKeys).map(formatSortKey);
    expect(sorted).toEqual([
      '0:00:00:00.000000000:0010:00000001',
      '0:09:59:59.999999000:0001:00000001',
      '0:10:00:00.000000999:0005:00000009',
      '0:10:00:00.000001000:0000:00000001',
      '0:10:00:00.000001000:0000:00000002',
      '0:10:00:00.000001000:0002:00000001',
      '0:23:59:59.999999999:0001:00000002',
      '1:00:30:00.000000000:0000:00000005',
    ]);
  });

  it('agrees with plain string comparison of the formatted keys', () => {
    const byComparator = [...keys].sort(compareSortKeys).map(formatSortKey);
    const byString = keys.map(formatSortKey).sort();
    expect(byString).toEqual(byComparator);
  });

  it('never reports two distinct (source, row) pairs as equal', () => {
    expect(compareSortKeys(key(0, 1, 1, 1, 1, 0, 1), key(0, 1, 1, 1, 1, 0, 2))).toBeLessThan(0);
    expect(compareSortKeys(key(0, 1, 1, 1, 1, 1, 1), key(0, 1, 1, 1, 1, 0, 1))).toBeGreaterThan(0);
  });
});

// ---------------------------------------------------------------------------
// TAG-U3
// ---------------------------------------------------------------------------

describe('LineTagger — TAG-U3: provenance shortening', () => {
  it('shortens an 80-character name to head, ellipsis and tail', () => {
    const name = 'logs/' + 'x'.repeat(35) + '/' + 'y'.repeat(39);
    expect(name).toHaveLength(80);

    const short = shortenName(name);

    expect(short).toBe('logs/' + 'x'.repeat(12) + '...' + '/' + 'y'.repeat(39));
    expect(short).toHaveLength(60);
  });

  it('leaves a name of exactly 60 characters unchanged', () => {
    const name = 'n'.repeat(60);
    expect(shortenName(name)).toBe(name);
  });

  it('counts a character outside the BMP once', () => {
    const name = 'x'.repeat(59) + '\u{1F600}';
    expect(name).toHaveLength(61);
    expect(shortenName(name)).toBe(name);
  });

  it('never splits a surrogate pair at the head boundary', () => {
    const name = 'a'.repeat(16) + '\u{1F600}' + 'b'.repeat(53);

    expect(shortenName(name)).toBe('a'.repeat(16) + '\u{1F600}' + '...' + 'b'.repeat(40));
  });
});

// ---------------------------------------------------------------------------
// TAG-U4
// ---------------------------------------------------------------------------

describe('LineTagger — TAG-U4: rendering', () => {
  it('renders display time, padded tag and the raw line', () => {
    const line = tagLine({
      dayNumber: 0,
      time: { hour: 9, minute: 59, second: 59, nanos: 999999000 },
      sourceIndex: 1,
      rowNumber: 1,
      provenanceTag: '/b.log',
      rawLine: 'I0101 09:59:59.999999 boot',
    });

    expect(line.sortKey).toBe('0:09:59:59.999999000:0001:00000001');
    expect(line.displayTime).toBe('09:59:59.999999000');
    expect(renderLine(line)).toBe(
      '09:59:59.999999000 [/b.log]' + ' '.repeat(54) + ' I0101 09:59:59.999999 boot',
    );
  });

  it('fills the tag column exactly for a maximum-length name', () => {
    const line = tagLine({
      dayNumber: 1,
      time: { hour: 0, minute: 0, second: 1, nanos: 0 },
      sourceIndex: 0,
      rowNumber: 7,
      provenanceTag: 'p'.repeat(60),
      rawLine: 'after midnight',
    });

    expect(TAG_COLUMN_WIDTH).toBe(62);
    expect(renderLine(line)).toBe(`00:00:01.000000000 [${'p'.repeat(60)}] after midnight`);
  });

  it('aligns non-ASCII names by code point and encodes them as UTF-8', () => {
    const line = tagLine({
      dayNumber: 0,
      time: { hour: 0, minute: 0, second: 0, nanos: 0 },
      sourceIndex: 0,
      rowNumber: 1,
      provenanceTag: '\u{1F600}.log',
      rawLine: 'x',
    });

    const text = Buffer.from(renderLine(line), LINE_ENCODING).toString('utf8');

    expect(text).toBe('00:00:00.000000000 [\u{1F600}.log]' + ' '.repeat(55) + ' x');
  });

  it('appends the raw line bytes untouched', () => {
    const line = tagLine({
      dayNumber: 0,
      time: { hour: 0, minute: 0, second: 0, nanos: 0 },
      sourceIndex: 0,
      rowNumber: 1,
      provenanceTag: 'a.log',
      rawLine: 'a\xff\xfeb',
    });

    expect(renderLine(line).endsWith('] a\xff\xfeb')).toBe(true);
  });
});
