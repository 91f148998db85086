/**
 * logweave <locator> — merge every log under a locator by time
 *
 * Resolves configuration, lists the sources behind the locator, merges them
 * through the engine and writes the result to stdout. Any failure prints a
 * single diagnostic on stderr and nothing further on stdout.
 */

import type { Writable } from 'node:stream';
import type { ColorSupportLevel } from 'chalk';
import { listSources, mergeSources } from '@logweave/engine';
import type { FetchLike, Locator, LogweaveConfig } from '@logweave/sources';
import { createBackend, parseLocator, resolveConfig, writeLines } from '@logweave/sources';
import { Reporter } from '../output/diagnostics.js';
import { createTheme, stderrColorLevel } from '../output/theme.js';

export interface MergeIO {
  readonly stdout: Writable;
  readonly stderr: Writable;
  /** Environment for configuration. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** HTTP client for bucket locators. Default: the global fetch. */
  readonly fetch?: FetchLike | undefined;
  /** Default: whatever stderr supports. */
  readonly colorLevel?: ColorSupportLevel | undefined;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Run one merge. Resolves to the process exit code: 0 on success, 1 after
 * any fatal error.
 */
export async function runMerge(locatorInput: string, io: MergeIO): Promise<number> {
  const theme = createTheme(io.colorLevel ?? stderrColorLevel());

  let config: LogweaveConfig;
  try {
    config = resolveConfig({ env: io.env });
  } catch (err: unknown) {
    new Reporter(io.stderr, theme, false).error(err);
    return 1;
  }

  const reporter = new Reporter(io.stderr, theme, config.debug);
  try {
    const locator = parseLocator(locatorInput, config);
    const backend = createBackend(locator, config, { fetch: io.fetch });
    reporter.debug(`backend: ${backend.kind} ${describeLocator(locator)}`);

    const sources = await listSources(backend);
    reporter.debug(`sources: ${sources.length}`);

    const lines = await mergeSources(backend, sources, {
      maxLineBytes: config.maxLineBytes,
      signal: io.signal,
      onSourceComplete: (source, lineCount) => {
        reporter.debug(`read ${source.name}: ${lineCount} lines`);
      },
    });
    await writeLines(io.stdout, lines);
    return 0;
  } catch (err: unknown) {
    reporter.error(err);
    return 1;
  }
}

function describeLocator(locator: Locator): string {
  return locator.kind === 'bucket' ? `gs://${locator.bucket}/${locator.prefix}` : locator.path;
}
