/**
 * Logweave Engine — Per-Source Processor
 *
 * Drives one source end to end: open, scan line by line in file order,
 * extract a time for every line, track day rollover, tag.
 *
 * Day rollover: once a line's hour is more than one hour earlier than the
 * hour of the source's first matched line, the source is taken to have
 * crossed midnight and every line from then on gets dayNumber 1. The flag
 * never resets. The rule is coarse: a source whose clock steps back by
 * less than the threshold across midnight is not detected.
 */

import type { SourceBackend, OpenedSource } from '../adapters/index.js';
import { LogweaveError, OpenError } from '../errors.js';
import type { TimestampExtractor } from '../time/extractor.js';
import type { Timestamp } from '../types/timestamp.js';
import { ZERO_TIMESTAMP } from '../types/timestamp.js';
import type { Source } from '../types/source.js';
import type { RollingTimeState, TaggedLine } from '../types/tagged-line.js';
import { shortenName, tagLine } from '../tagging/line-tagger.js';
import { scanLines } from './line-scanner.js';

// ---------------------------------------------------------------------------
// Rolling time state
// ---------------------------------------------------------------------------

export function createRollingTimeState(): RollingTimeState {
  return { currentTime: ZERO_TIMESTAMP, firstTime: undefined, dayNumber: 0 };
}

/**
 * Fold one line's match (undefined when the line carried no time) into the
 * state. Returns the time the line is filed under.
 */
export function advanceTime(state: RollingTimeState, matched: Timestamp | undefined): Timestamp {
  if (matched !== undefined) {
    state.currentTime = matched;
    if (state.firstTime === undefined) state.firstTime = matched;
  }
  if (state.firstTime !== undefined && state.currentTime.hour < state.firstTime.hour - 1) {
    state.dayNumber = 1;
  }
  return state.currentTime;
}

// ---------------------------------------------------------------------------
// Processing
// ---------------------------------------------------------------------------

export interface ProcessOptions {
  readonly extractor: TimestampExtractor;
  readonly signal: AbortSignal;
  readonly maxLineBytes?: number | undefined;
}

/**
 * Process one source into its ordered batch of TaggedLines.
 *
 * The opened stream is closed on every exit path. If `signal` is aborted
 * mid-scan the batch is discarded and the abort reason is thrown.
 *
 * @throws {OpenError} If the backend cannot open the source
 * @throws {ScanError} If a line is too long or the stream fails mid-read
 */
export async function processSource(
  source: Source,
  backend: SourceBackend,
  options: ProcessOptions,
): Promise<TaggedLine[]> {
  options.signal.throwIfAborted();

  let opened: OpenedSource;
  try {
    opened = await backend.open(source.name, options.signal);
  } catch (err: unknown) {
    if (err instanceof LogweaveError) throw err;
    throw new OpenError(source.name, { cause: err });
  }

  const provenanceTag = shortenName(source.displayName);
  const state = createRollingTimeState();
  const lines: TaggedLine[] = [];
  let rowNumber = 0;

  try {
    const scan = scanLines(opened.chunks, {
      sourceName: source.name,
      maxLineBytes: options.maxLineBytes,
      signal: options.signal,
    });
    for await (const rawLine of scan) {
      rowNumber++;
      const time = advanceTime(state, options.extractor.match(rawLine)?.time);
      lines.push(
        tagLine({
          dayNumber: state.dayNumber,
          time,
          sourceIndex: source.index,
          rowNumber,
          provenanceTag,
          rawLine,
        }),
      );
    }
  } finally {
    await opened.close();
  }

  options.signal.throwIfAborted();
  return lines;
}
