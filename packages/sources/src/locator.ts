/**
 * Logweave Sources — Locator Resolution
 *
 * A locator is the single positional argument a user supplies:
 *
 *   https://<host>/.../<bucket>/<prefix>   bucket URL (bucket from config)
 *   gs://<bucket>/<prefix>                 bucket, named explicitly
 *   anything else                          local file or directory
 *
 * parseLocator() classifies the string; createBackend() builds the matching
 * SourceBackend.
 */

import type { SourceBackend } from '@logweave/engine';
import { EnumerationError } from '@logweave/engine';
import type { LogweaveConfig } from './config.js';
import { BucketBackend } from './adapters/bucket.js';
import type { FetchLike } from './adapters/bucket.js';
import { DirectoryBackend } from './adapters/directory.js';

export type Locator =
  | { readonly kind: 'bucket'; readonly bucket: string; readonly prefix: string }
  | { readonly kind: 'directory'; readonly path: string };

/**
 * Classify a locator string.
 *
 * @throws {EnumerationError} If an http(s) locator does not contain the
 *   configured bucket, or a gs:// locator has no bucket
 */
export function parseLocator(input: string, config: Pick<LogweaveConfig, 'bucket'>): Locator {
  if (input.startsWith('http://') || input.startsWith('https://')) {
    const marker = `/${config.bucket}/`;
    const at = input.indexOf(marker);
    if (at < 0) {
      throw new EnumerationError(
        `unable to determine prefix: ${input} is not inside bucket ${config.bucket}`,
      );
    }
    return { kind: 'bucket', bucket: config.bucket, prefix: input.slice(at + marker.length) };
  }

  if (input.startsWith('gs://')) {
    const rest = input.slice('gs://'.length);
    const slash = rest.indexOf('/');
    const bucket = slash < 0 ? rest : rest.slice(0, slash);
    if (bucket === '') {
      throw new EnumerationError(`unable to determine bucket: ${input}`);
    }
    return { kind: 'bucket', bucket, prefix: slash < 0 ? '' : rest.slice(slash + 1) };
  }

  return { kind: 'directory', path: input };
}

export interface BackendDeps {
  /** HTTP client for bucket access. Default: the global fetch. */
  readonly fetch?: FetchLike | undefined;
}

export function createBackend(
  locator: Locator,
  config: Pick<LogweaveConfig, 'storageUrl'>,
  deps?: BackendDeps,
): SourceBackend {
  switch (locator.kind) {
    case 'bucket':
      return new BucketBackend({
        bucket: locator.bucket,
        prefix: locator.prefix,
        storageUrl: config.storageUrl,
        fetch: deps?.fetch,
      });
    case 'directory':
      return new DirectoryBackend(locator.path);
  }
}
