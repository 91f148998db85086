/**
 * Logweave Engine — Aggregator
 *
 * Runs one Per-Source Processor per source, all at once, and merges their
 * batches into a single ordered stream of output lines.
 *
 *   - Workers share no mutable state; each owns its RollingTimeState.
 *   - Completion order is irrelevant: the global sort is the only ordering
 *     authority.
 *   - Fail fast: the first worker failure aborts every other worker through
 *     a shared AbortController, and the merge rejects with that failure.
 *     No partial output is ever returned.
 */

import type { SourceBackend } from '../adapters/index.js';
import { EnumerationError, LogweaveError, describeCause } from '../errors.js';
import { TimestampExtractor } from '../time/extractor.js';
import type { Source } from '../types/source.js';
import { toSources } from '../types/source.js';
import type { TaggedLine } from '../types/tagged-line.js';
import { compareSortKeys, renderLine } from '../tagging/line-tagger.js';
import { processSource } from '../processing/source-processor.js';

export interface MergeOptions {
  /** Defaults to a TimestampExtractor over DEFAULT_TIME_MATCHERS. */
  readonly extractor?: TimestampExtractor | undefined;
  readonly maxLineBytes?: number | undefined;
  /** External cancellation of the whole run. */
  readonly signal?: AbortSignal | undefined;
  /** Called once per source whose batch completed successfully. */
  readonly onSourceComplete?: ((source: Source, lineCount: number) => void) | undefined;
}

/**
 * Order TaggedLines by sort key. Returns a new array; the input is left
 * untouched.
 */
export function orderTaggedLines(lines: ReadonlyArray<TaggedLine>): TaggedLine[] {
  return [...lines].sort((a, b) => compareSortKeys(a.key, b.key));
}

/**
 * Merge the given sources into rendered output lines (no trailing newline
 * on each element). Lines are LINE_ENCODING byte strings, see renderLine().
 */
export async function mergeSources(
  backend: SourceBackend,
  sources: ReadonlyArray<Source>,
  options: MergeOptions = {},
): Promise<string[]> {
  options.signal?.throwIfAborted();

  const extractor = options.extractor ?? new TimestampExtractor();
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  options.signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const batches = await Promise.all(
      sources.map(async (source) => {
        try {
          const batch = await processSource(source, backend, {
            extractor,
            signal: controller.signal,
            maxLineBytes: options.maxLineBytes,
          });
          options.onSourceComplete?.(source, batch.length);
          return batch;
        } catch (err: unknown) {
          controller.abort(err);
          throw err;
        }
      }),
    );
    return orderTaggedLines(batches.flat()).map(renderLine);
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Enumerate a backend into the ordered source list.
 *
 * @throws {EnumerationError} If listing fails
 */
export async function listSources(backend: SourceBackend): Promise<Source[]> {
  try {
    const listing = await backend.list();
    return toSources(listing.names, listing.prefix);
  } catch (err: unknown) {
    if (err instanceof LogweaveError) throw err;
    throw new EnumerationError(`failed to list sources: ${describeCause(err)}`, { cause: err });
  }
}
