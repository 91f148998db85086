/**
 * Logweave Engine — Line Scanner
 *
 * Splits a byte stream into lines.
 *
 *   - '\n' terminates a line; a single '\r' before it is dropped
 *   - a final line without a terminator is emitted when non-empty
 *   - lines are yielded as LINE_ENCODING byte strings, so every input byte
 *     survives, valid UTF-8 or not
 *   - a line longer than maxLineBytes (excluding the terminator) fails the
 *     scan with ScanError; so does any error raised by the stream itself
 *   - when `signal` is aborted the scanner stops at the next line boundary
 *     without emitting anything further
 */

import { ScanError, describeCause } from '../errors.js';
import { LINE_ENCODING } from '../types/tagged-line.js';

/** Longest line accepted by default: 32 MiB. */
export const DEFAULT_MAX_LINE_BYTES = 32 * 1024 * 1024;

const LF = 0x0a;
const CR = 0x0d;

export interface ScanOptions {
  /** Source name, used in error messages. */
  readonly sourceName: string;
  readonly maxLineBytes?: number | undefined;
  readonly signal?: AbortSignal | undefined;
}

export async function* scanLines(
  chunks: AsyncIterable<Uint8Array>,
  options: ScanOptions,
): AsyncGenerator<string, void, undefined> {
  const max = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
  let pending: Buffer[] = [];
  let pendingBytes = 0;

  const tooLong = (): ScanError =>
    new ScanError(options.sourceName, `line exceeds maximum length of ${max} bytes`);

  try {
    for await (const chunk of chunks) {
      if (options.signal?.aborted === true) return;
      const buf = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
      let start = 0;
      for (let nl = buf.indexOf(LF, start); nl !== -1; nl = buf.indexOf(LF, start)) {
        const segment = buf.subarray(start, nl);
        if (pendingBytes + segment.length > max) throw tooLong();
        const line = pending.length === 0 ? segment : Buffer.concat([...pending, segment]);
        pending = [];
        pendingBytes = 0;
        start = nl + 1;
        yield decode(line);
        if (options.signal?.aborted) return;
      }
      if (start < buf.length) {
        const rest = buf.subarray(start);
        pendingBytes += rest.length;
        if (pendingBytes > max) throw tooLong();
        pending.push(rest);
      }
    }
  } catch (err: unknown) {
    if (err instanceof ScanError) throw err;
    throw new ScanError(options.sourceName, describeCause(err), { cause: err });
  }

  if (pendingBytes > 0) {
    yield decode(Buffer.concat(pending));
  }
}

function decode(line: Buffer): string {
  const end = line.length > 0 && line[line.length - 1] === CR ? line.length - 1 : line.length;
  return line.toString(LINE_ENCODING, 0, end);
}
