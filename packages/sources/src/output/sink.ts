/**
 * Logweave Sources — Output Sink
 *
 * Writes merged lines to a stream, newline-terminated, in order. Lines are
 * batched into chunks of roughly BATCH_BYTES. Each chunk is handed to the
 * stream only after the previous one was flushed, so at most one chunk is
 * ever buffered; the returned promise settles when the last chunk is flushed.
 *
 * Lines are engine byte strings and are written back as the bytes they
 * stand for.
 */

import type { Writable } from 'node:stream';
import { LINE_ENCODING } from '@logweave/engine';

const BATCH_BYTES = 64 * 1024;

export async function writeLines(out: Writable, lines: Iterable<string>): Promise<void> {
  let batch: string[] = [];
  let batchBytes = 0;

  for (const line of lines) {
    batch.push(line, '\n');
    batchBytes += line.length + 1;
    if (batchBytes >= BATCH_BYTES) {
      await writeChunk(out, batch.join(''));
      batch = [];
      batchBytes = 0;
    }
  }
  if (batch.length > 0) await writeChunk(out, batch.join(''));
}

function writeChunk(out: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    out.write(chunk, LINE_ENCODING, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
