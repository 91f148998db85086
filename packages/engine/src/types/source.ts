/**
 * Logweave Engine — Source Types
 *
 * A Source is one log-bearing object or file contributing lines to a merge.
 * Sources are created once at discovery, consumed by exactly one
 * Per-Source Processor, and discarded after their lines are emitted.
 */

/**
 * One discovered input.
 *
 * `index` is the source's position in the discovered list. It is assigned
 * once, never reused, and breaks ties between lines from different sources
 * that carry the same time.
 */
export interface Source {
  readonly index: number;
  /** Fully-qualified object name or file path. */
  readonly name: string;
  /** `name` with the listing prefix removed, before shortening. */
  readonly displayName: string;
}

/**
 * Build the ordered source list from an enumeration result.
 *
 * Index assignment follows `names` order exactly. The prefix is removed
 * only when the name starts with it.
 */
export function toSources(names: ReadonlyArray<string>, prefix: string): Source[] {
  return names.map((name, index) => ({
    index,
    name,
    displayName: prefix !== '' && name.startsWith(prefix) ? name.slice(prefix.length) : name,
  }));
}
