/**
 * Logweave Engine — Source Collaborator Interfaces
 *
 * The engine never lists a bucket, walks a directory or opens a file
 * itself. Those side effects belong to backends injected by the caller;
 * this module only defines their contracts. Concrete backends live in
 * @logweave/sources.
 */

// ---------------------------------------------------------------------------
// Listing
// ---------------------------------------------------------------------------

/**
 * The result of enumerating a root locator.
 *
 * `names` order defines each source's index. `prefix` is the common root
 * removed from names for display.
 */
export interface SourceListing {
  readonly prefix: string;
  readonly names: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Opened source
// ---------------------------------------------------------------------------

/**
 * A scoped, read-only byte stream for one source.
 *
 * The holder must call close() exactly once on every exit path, including
 * early failure and cancellation.
 */
export interface OpenedSource {
  readonly chunks: AsyncIterable<Uint8Array>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export type SourceBackendKind = 'bucket' | 'directory' | 'memory';

/**
 * A place log sources come from.
 *
 * Implementations:
 *   DirectoryBackend — local directory tree
 *   BucketBackend    — public object-storage bucket over HTTPS
 *   MemoryBackend    — in-memory sources for tests and embedded use
 */
export interface SourceBackend {
  readonly kind: SourceBackendKind;

  /**
   * List candidate sources.
   *
   * @throws {EnumerationError} If the root cannot be listed
   */
  list(): Promise<SourceListing>;

  /**
   * Open one listed source for reading.
   *
   * `signal` is aborted when the run is being torn down; implementations
   * pass it to any network request they make.
   *
   * @throws {OpenError} If the source cannot be opened
   */
  open(name: string, signal: AbortSignal): Promise<OpenedSource>;
}

// ---------------------------------------------------------------------------
// Source filter
// ---------------------------------------------------------------------------

/** Name endings that qualify an object or file as a log input. */
export const LOG_NAME_SUFFIXES: ReadonlyArray<string> = ['.log', 'build-log.txt'];

export function isLogName(name: string): boolean {
  return LOG_NAME_SUFFIXES.some((suffix) => name.endsWith(suffix));
}
