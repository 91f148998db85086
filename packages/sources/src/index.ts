/**
 * @logweave/sources
 *
 * Concrete collaborators for the merge engine: configuration, locator
 * resolution, the directory, bucket and in-memory backends, and the output
 * sink. Everything that touches the file system, the network or the
 * process environment lives here.
 */

export type { LogweaveConfig, ResolveConfigOptions } from './config.js';
export { DEFAULT_BUCKET, DEFAULT_STORAGE_URL, resolveConfig } from './config.js';

export type { Locator, BackendDeps } from './locator.js';
export { parseLocator, createBackend } from './locator.js';

export type { FetchLike, BucketBackendOptions } from './adapters/bucket.js';
export { BucketBackend } from './adapters/bucket.js';
export { DirectoryBackend } from './adapters/directory.js';
export { MemoryBackend } from './adapters/memory.js';

export { writeLines } from './output/sink.js';
