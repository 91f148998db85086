/**
 * Logweave Engine — Error Kinds
 *
 * Every fatal condition of a merge run is one of these. A timestamp that
 * cannot be extracted is never an error: extraction falls back to the
 * previous line's time.
 *
 * Propagation:
 *   EnumerationError — raised before any worker starts
 *   OpenError        — a worker could not open its source
 *   ScanError        — a line exceeded the maximum length, or the stream
 *                      failed mid-read
 *   ConfigError      — invalid configuration, raised at start-up
 *
 * The first OpenError or ScanError from any worker ends the whole run.
 */

export type LogweaveErrorKind = 'enumeration' | 'open' | 'scan' | 'config';

export abstract class LogweaveError extends Error {
  abstract readonly kind: LogweaveErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EnumerationError extends LogweaveError {
  readonly kind = 'enumeration' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnumerationError';
  }
}

export class OpenError extends LogweaveError {
  readonly kind = 'open' as const;

  constructor(readonly sourceName: string, options?: { cause?: unknown }) {
    super(`failed to open ${sourceName}: ${describeCause(options?.cause)}`, options);
    this.name = 'OpenError';
  }
}

export class ScanError extends LogweaveError {
  readonly kind = 'scan' as const;

  constructor(
    readonly sourceName: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`failed to read ${sourceName}: ${detail}`, options);
    this.name = 'ScanError';
  }
}

export class ConfigError extends LogweaveError {
  readonly kind = 'config' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Human-readable form of an arbitrary thrown value. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

export function isLogweaveError(err: unknown): err is LogweaveError {
  return err instanceof LogweaveError;
}
