/**
 * Logweave Sources — Configuration Resolution
 *
 * Every setting is resolved with the same precedence:
 *
 *   1. Explicit option (e.g. from a caller embedding the merge)
 *   2. Environment variable
 *   3. Built-in default
 *
 *   Setting          Env var                    Default
 *   bucket           LOGWEAVE_BUCKET            kubernetes-jenkins
 *   storageUrl       LOGWEAVE_STORAGE_URL       https://storage.googleapis.com
 *   maxLineBytes     LOGWEAVE_MAX_LINE_BYTES    33554432 (32 MiB)
 *   debug            LOGWEAVE_DEBUG             false
 *
 * Use resolveConfig() once at start-up and pass the result down. Never read
 * process.env for these settings anywhere else.
 */

import { ConfigError, DEFAULT_MAX_LINE_BYTES } from '@logweave/engine';

export const DEFAULT_BUCKET = 'kubernetes-jenkins';
export const DEFAULT_STORAGE_URL = 'https://storage.googleapis.com';

export interface LogweaveConfig {
  /** Bucket whose name is looked for in http(s) locators. */
  readonly bucket: string;
  /** Base URL of the object-storage JSON API, without a trailing slash. */
  readonly storageUrl: string;
  readonly maxLineBytes: number;
  /** Print progress diagnostics to stderr. */
  readonly debug: boolean;
}

export interface ResolveConfigOptions {
  readonly bucket?: string | undefined;
  readonly storageUrl?: string | undefined;
  readonly maxLineBytes?: number | undefined;
  readonly debug?: boolean | undefined;
  /** Environment to read from. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the effective configuration.
 *
 * @throws {ConfigError} If a value is present but invalid
 */
export function resolveConfig(opts?: ResolveConfigOptions): LogweaveConfig {
  const env = opts?.env ?? process.env;

  const bucket = firstNonEmpty(opts?.bucket, env['LOGWEAVE_BUCKET']) ?? DEFAULT_BUCKET;
  if (bucket.includes('/')) {
    throw new ConfigError(`invalid bucket name: ${bucket}`);
  }

  const storageUrl = normalizeStorageUrl(
    firstNonEmpty(opts?.storageUrl, env['LOGWEAVE_STORAGE_URL']) ?? DEFAULT_STORAGE_URL,
  );

  let maxLineBytes = DEFAULT_MAX_LINE_BYTES;
  if (opts?.maxLineBytes !== undefined) {
    maxLineBytes = checkLineLimit(opts.maxLineBytes, String(opts.maxLineBytes));
  } else {
    const raw = firstNonEmpty(env['LOGWEAVE_MAX_LINE_BYTES']);
    if (raw !== undefined) maxLineBytes = checkLineLimit(Number(raw), raw);
  }

  const debug = opts?.debug ?? isTruthy(env['LOGWEAVE_DEBUG']);

  return { bucket, storageUrl, maxLineBytes, debug };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((v) => typeof v === 'string' && v !== '');
}

function normalizeStorageUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`invalid storage URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`invalid storage URL: ${raw}`);
  }
  return url.toString().replace(/\/+$/, '');
}

function checkLineLimit(value: number, raw: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`invalid maximum line length: ${raw}`);
  }
  return value;
}

function isTruthy(raw: string | undefined): boolean {
  return raw === '1' || raw?.toLowerCase() === 'true';
}
