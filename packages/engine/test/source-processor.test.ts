/**
 * Logweave Engine — Per-Source Processor Tests
 *
 *   PROC-U1: row numbers, fallback times and the zero-value start
 *   PROC-U2: day rollover is set once and never cleared
 *   PROC-U3: the provenance tag is the shortened display name
 *   PROC-U4: the stream is closed on success and on failure
 *   PROC-U5: open failures become OpenError
 *
 * All sources are in-process (FakeBackend); no files, no network.
 */

import { describe, it, expect } from 'vitest';
import {
  advanceTime,
  createRollingTimeState,
  processSource,
} from '../src/processing/source-processor.js';
import { TimestampExtractor } from '../src/time/extractor.js';
import { OpenError, ScanError } from '../src/errors.js';
import { ZERO_TIMESTAMP } from '../src/types/timestamp.js';
import type { Source } from '../src/types/source.js';
import { FakeBackend } from './helpers/fake-backend.js';

const extractor = new TimestampExtractor();

function source(name: string, index = 0, displayName = name): Source {
  return { index, name, displayName };
}

function run(backend: FakeBackend, src: Source, maxLineBytes?: number) {
  return processSource(src, backend, {
    extractor,
    signal: new AbortController().signal,
    maxLineBytes,
  });
}

// ---------------------------------------------------------------------------
// PROC-U1
// ---------------------------------------------------------------------------

describe('processSource — PROC-U1: rows and fallback', () => {
  it('numbers rows from 1 and carries the last matched time forward', async () => {
    const backend = new FakeBackend({
      'a.log': { text: 'no time here\nI0101 10:00:00.000001 x\ncontinuation\n' },
    });

    const lines = await run(backend, source('a.log', 2));

    expect(lines.map((l) => l.key.rowNumber)).toEqual([1, 2, 3]);
    expect(lines.map((l) => l.displayTime)).toEqual([
      '00:00:00.000000000',
      '10:00:00.000001000',
      '10:00:00.000001000',
    ]);
    expect(lines.map((l) => l.sortKey)).toEqual([
      '0:00:00:00.000000000:0002:00000001',
      '0:10:00:00.000001000:0002:00000002',
      '0:10:00:00.000001000:0002:00000003',
    ]);
    expect(lines.map((l) => l.rawLine)).toEqual(['no time here', 'I0101 10:00:00.000001 x', 'continuation']);
  });

  it('returns an empty batch for an empty source', async () => {
    const backend = new FakeBackend({ 'empty.log': { text: '' } });
    expect(await run(backend, source('empty.log'))).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// PROC-U2
// ---------------------------------------------------------------------------

describe('processSource — PROC-U2: day rollover', () => {
  it('flags lines after midnight and keeps the flag set', async () => {
    const backend = new FakeBackend({
      'node.log': {
        text: [
          'I0101 23:00:00.000000 a',
          'I0101 23:30:00.000000 b',
          'I0102 01:00:00.000000 c',
          'I0102 23:10:00.000000 d',
        ].join('\n'),
      },
    });

    const lines = await run(backend, source('node.log'));

    expect(lines.map((l) => l.key.dayNumber)).toEqual([0, 0, 1, 1]);
    expect(lines[2]?.sortKey).toBe('1:01:00:00.000000000:0000:00000003');
    expect(lines[3]?.sortKey).toBe('1:23:10:00.000000000:0000:00000004');
  });

  it('does not flag a line exactly one hour earlier than the first', () => {
    const state = createRollingTimeState();
    advanceTime(state, { hour: 5, minute: 0, second: 0, nanos: 0 });
    advanceTime(state, { hour: 4, minute: 0, second: 0, nanos: 0 });
    expect(state.dayNumber).toBe(0);

    advanceTime(state, { hour: 3, minute: 59, second: 0, nanos: 0 });
    expect(state.dayNumber).toBe(1);

    advanceTime(state, { hour: 6, minute: 0, second: 0, nanos: 0 });
    expect(state.dayNumber).toBe(1);
  });

  it('leaves firstTime unset until a line actually carries a time', () => {
    const state = createRollingTimeState();

    expect(advanceTime(state, undefined)).toBe(ZERO_TIMESTAMP);
    expect(state.firstTime).toBeUndefined();

    const t = { hour: 12, minute: 0, second: 0, nanos: 0 };
    expect(advanceTime(state, t)).toBe(t);
    expect(state.firstTime).toBe(t);

    advanceTime(state, { hour: 13, minute: 0, second: 0, nanos: 0 });
    expect(state.firstTime).toBe(t);
  });
});

// ---------------------------------------------------------------------------
// PROC-U3
// ---------------------------------------------------------------------------

describe('processSource — PROC-U3: provenance', () => {
  it('tags every line with the shortened display name', async () => {
    const displayName = '/' + 'd'.repeat(79);
    const backend = new FakeBackend({ 'deep.log': { text: 'one\ntwo\n' } });

    const lines = await run(backend, source('deep.log', 0, displayName));

    const expected = '/' + 'd'.repeat(16) + '...' + 'd'.repeat(40);
    expect(lines.map((l) => l.provenanceTag)).toEqual([expected, expected]);
  });
});

// ---------------------------------------------------------------------------
// PROC-U4
// ---------------------------------------------------------------------------

describe('processSource — PROC-U4: stream release', () => {
  it('closes the stream after a successful scan', async () => {
    const backend = new FakeBackend({ 'a.log': { text: 'x\n' } });
    await run(backend, source('a.log'));
    expect(backend.closed).toEqual(['a.log']);
  });

  it('closes the stream when the scan fails', async () => {
    const backend = new FakeBackend({ 'big.log': { text: 'x'.repeat(20) + '\n' } });

    await expect(run(backend, source('big.log'), 10)).rejects.toBeInstanceOf(ScanError);
    expect(backend.closed).toEqual(['big.log']);
  });

  it('does not open the source when the signal is already aborted', async () => {
    const backend = new FakeBackend({ 'a.log': { text: 'x\n' } });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(
      processSource(source('a.log'), backend, { extractor, signal: controller.signal }),
    ).rejects.toThrow('stop');
    expect(backend.opened).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// PROC-U5
// ---------------------------------------------------------------------------

describe('processSource — PROC-U5: open failure', () => {
  it('wraps a backend error in OpenError', async () => {
    const backend = new FakeBackend({
      'missing.log': { openError: new Error('ENOENT: no such file') },
    });

    const err: unknown = await run(backend, source('missing.log')).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OpenError);
    if (!(err instanceof OpenError)) return;
    expect(err.message).toBe('failed to open missing.log: ENOENT: no such file');
    expect(err.sourceName).toBe('missing.log');
  });

  it('passes an OpenError from the backend through unchanged', async () => {
    const original = new OpenError('gone.log', { cause: new Error('HTTP 404') });
    const backend = new FakeBackend({ 'gone.log': { openError: original } });

    await expect(run(backend, source('gone.log'))).rejects.toBe(original);
  });
});
