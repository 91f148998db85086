/**
 * Logweave Sources — Bucket Backend
 *
 * Lists and reads objects of a public object-storage bucket through its
 * JSON API, without authentication:
 *
 *   list:  GET <storageUrl>/storage/v1/b/<bucket>/o?prefix=<prefix>&fields=...
 *          (paginated with nextPageToken, names only)
 *   read:  GET <storageUrl>/storage/v1/b/<bucket>/o/<name>?alt=media
 *
 * Object names are full names within the bucket; the listing prefix is the
 * requested prefix.
 */

import type { OpenedSource, SourceBackend, SourceListing } from '@logweave/engine';
import { EnumerationError, OpenError, describeCause, isLogName } from '@logweave/engine';

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface BucketBackendOptions {
  readonly bucket: string;
  readonly prefix: string;
  readonly storageUrl: string;
  /** Default: the global fetch. */
  readonly fetch?: FetchLike | undefined;
}

interface ObjectPage {
  readonly names: string[];
  readonly nextPageToken: string | undefined;
}

export class BucketBackend implements SourceBackend {
  readonly kind = 'bucket' as const;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: BucketBackendOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** `gs://<bucket>/<prefix>`, used in messages. */
  get location(): string {
    return `gs://${this.options.bucket}/${this.options.prefix}`;
  }

  /**
   * @throws {EnumerationError} On a network failure, a non-2xx response or
   *   a malformed listing page
   */
  async list(): Promise<SourceListing> {
    const names: string[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.fetchPage(pageToken);
      names.push(...page.names.filter(isLogName));
      pageToken = page.nextPageToken;
    } while (pageToken !== undefined);
    return { prefix: this.options.prefix, names };
  }

  /**
   * @throws {OpenError} On a network failure or a non-2xx response
   */
  async open(name: string, signal: AbortSignal): Promise<OpenedSource> {
    const url =
      `${this.bucketUrl()}/o/${encodeURIComponent(name)}?alt=media`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal });
    } catch (err: unknown) {
      throw new OpenError(name, { cause: err });
    }
    if (!response.ok) {
      throw new OpenError(name, { cause: new Error(httpStatus(response)) });
    }
    return openBody(response);
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private bucketUrl(): string {
    return `${this.options.storageUrl}/storage/v1/b/${encodeURIComponent(this.options.bucket)}`;
  }

  private async fetchPage(pageToken: string | undefined): Promise<ObjectPage> {
    const params = new URLSearchParams({
      prefix: this.options.prefix,
      fields: 'items(name),nextPageToken',
    });
    if (pageToken !== undefined) params.set('pageToken', pageToken);

    let body: unknown;
    try {
      const response = await this.fetchImpl(`${this.bucketUrl()}/o?${params.toString()}`);
      if (!response.ok) {
        throw new EnumerationError(`failed to list ${this.location}: ${httpStatus(response)}`);
      }
      body = await response.json();
    } catch (err: unknown) {
      if (err instanceof EnumerationError) throw err;
      throw new EnumerationError(`failed to list ${this.location}: ${describeCause(err)}`, {
        cause: err,
      });
    }

    const page = toObjectPage(body);
    if (page === null) {
      throw new EnumerationError(`failed to list ${this.location}: malformed listing response`);
    }
    return page;
  }
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

function httpStatus(response: Response): string {
  return `HTTP ${response.status}${response.statusText !== '' ? ` ${response.statusText}` : ''}`;
}

/**
 * Validate one listing page. `items` is absent on an empty page.
 * Returns null when the body does not have the expected shape.
 */
function toObjectPage(body: unknown): ObjectPage | null {
  if (typeof body !== 'object' || body === null) return null;

  const names: string[] = [];
  if ('items' in body && body.items !== undefined) {
    if (!Array.isArray(body.items)) return null;
    for (const item of body.items) {
      if (typeof item !== 'object' || item === null || !('name' in item)) return null;
      if (typeof item.name !== 'string') return null;
      names.push(item.name);
    }
  }

  let nextPageToken: string | undefined;
  if ('nextPageToken' in body && body.nextPageToken !== undefined) {
    if (typeof body.nextPageToken !== 'string') return null;
    nextPageToken = body.nextPageToken === '' ? undefined : body.nextPageToken;
  }
  return { names, nextPageToken };
}

/**
 * Wrap a response body as an OpenedSource.
 *
 * close() cancels the body unless it was read to the end or already failed,
 * releasing the underlying connection.
 */
function openBody(response: Response): OpenedSource {
  const body = response.body;
  if (body === null) {
    return { chunks: emptyChunks(), close: async () => undefined };
  }

  const reader = body.getReader();
  let settled = false;

  async function* chunks(): AsyncGenerator<Uint8Array> {
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          settled = true;
          return;
        }
        yield value;
      }
    } catch (err: unknown) {
      settled = true;
      throw err;
    }
  }

  return {
    chunks: chunks(),
    close: async () => {
      if (!settled) await reader.cancel();
    },
  };
}

async function* emptyChunks(): AsyncGenerator<Uint8Array> {
  // no body
}
