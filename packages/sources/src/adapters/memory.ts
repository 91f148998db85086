/**
 * Logweave Sources — In-memory Backend
 *
 * Serves sources from a name → text map. Used for embedding the merge in
 * another program and for tests that must not touch the file system or
 * the network.
 *
 * Names are listed in insertion order and the isLogName filter is applied,
 * matching what the directory and bucket backends do.
 */

import type { OpenedSource, SourceBackend, SourceListing } from '@logweave/engine';
import { OpenError, isLogName } from '@logweave/engine';

export class MemoryBackend implements SourceBackend {
  readonly kind = 'memory' as const;
  private readonly files: Map<string, string>;
  private readonly openCounts: Map<string, number> = new Map();
  private closeCount = 0;

  constructor(files: Readonly<Record<string, string>>, private readonly prefix = '') {
    this.files = new Map(Object.entries(files));
  }

  async list(): Promise<SourceListing> {
    return {
      prefix: this.prefix,
      names: [...this.files.keys()].filter(isLogName),
    };
  }

  async open(name: string): Promise<OpenedSource> {
    const text = this.files.get(name);
    if (text === undefined) {
      throw new OpenError(name, { cause: new Error('no such source') });
    }
    this.openCounts.set(name, (this.openCounts.get(name) ?? 0) + 1);

    const bytes = Buffer.from(text, 'utf8');
    return {
      chunks: (async function* () {
        if (bytes.length > 0) yield bytes;
      })(),
      close: async () => {
        this.closeCount += 1;
      },
    };
  }

  /**
   * Number of times a source has been opened.
   *
   * Not part of the SourceBackend interface. Tests use it together with
   * closedCount() to check that every opened source was released.
   */
  openedCount(name: string): number {
    return this.openCounts.get(name) ?? 0;
  }

  closedCount(): number {
    return this.closeCount;
  }
}
