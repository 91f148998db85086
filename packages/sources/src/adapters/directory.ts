/**
 * Logweave Sources — Directory Backend
 *
 * Lists and opens log files under a local directory tree.
 *
 * Listing walks the tree depth-first with the entries of each directory in
 * byte order of their names, so the same tree always yields the same
 * source indexes. Symbolic links are listed like files when their name
 * qualifies and are never descended into. A root that is itself a file is
 * listed on its own.
 *
 * Names are absolute paths. The listing prefix is the absolute root
 * directory, so display names start with the path separator.
 */

import { open, readdir, stat } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import type { Dirent } from 'node:fs';
import type { OpenedSource, SourceBackend, SourceListing } from '@logweave/engine';
import { EnumerationError, OpenError, describeCause, isLogName } from '@logweave/engine';

// ---------------------------------------------------------------------------
// Path safety helpers
// ---------------------------------------------------------------------------

/**
 * Reject paths containing null bytes. They are never valid in filesystem
 * paths and some platforms truncate at them.
 */
function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`invalid path: null byte detected in ${JSON.stringify(path)}`);
  }
}

// ---------------------------------------------------------------------------
// DirectoryBackend
// ---------------------------------------------------------------------------

export class DirectoryBackend implements SourceBackend {
  readonly kind = 'directory' as const;
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * @throws {EnumerationError} If the root is missing or a directory cannot be read
   */
  async list(): Promise<SourceListing> {
    try {
      assertSafePath(this.root);
      const rootStat = await stat(this.root);
      if (!rootStat.isDirectory()) {
        const prefix = dirname(this.root) + sep;
        return { prefix, names: isLogName(this.root) ? [this.root] : [] };
      }
      const names: string[] = [];
      await walk(this.root, names);
      return { prefix: this.root, names };
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        throw new EnumerationError(`no such file or directory: ${this.root}`, { cause: err });
      }
      throw new EnumerationError(
        `failed to get object names from path ${this.root}: ${describeCause(err)}`,
        { cause: err },
      );
    }
  }

  /**
   * Open a file read-only. The returned close() releases the file handle.
   *
   * @throws {OpenError} If the file cannot be opened
   */
  async open(name: string): Promise<OpenedSource> {
    try {
      assertSafePath(name);
      const handle = await open(name, 'r');
      const stream = handle.createReadStream({ autoClose: false });
      return {
        chunks: stream,
        close: async () => {
          stream.destroy();
          await handle.close();
        },
      };
    } catch (err: unknown) {
      throw new OpenError(name, { cause: err });
    }
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function walk(dir: string, out: string[]): Promise<void> {
  const entries: Dirent[] = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(fullPath, out);
    } else if (isLogName(fullPath)) {
      out.push(fullPath);
    }
  }
}

function isNodeError(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}
