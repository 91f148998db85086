/**
 * @logweave/engine
 *
 * Timestamp extraction and merge engine: turns N independently timestamped
 * log streams into one globally time-ordered stream.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, node:http(s) or fetch. Listing and opening
 * sources is delegated to injected SourceBackend implementations, which
 * live in @logweave/sources.
 */

// Types
export type { Timestamp } from './types/timestamp.js';
export {
  TimePrecision,
  ZERO_TIMESTAMP,
  compareTimestamps,
  formatTimestamp,
} from './types/timestamp.js';

export type { Source } from './types/source.js';
export { toSources } from './types/source.js';

export type { SortKey, TaggedLine, RollingTimeState } from './types/tagged-line.js';
export { LINE_ENCODING } from './types/tagged-line.js';

// Errors
export type { LogweaveErrorKind } from './errors.js';
export {
  LogweaveError,
  EnumerationError,
  OpenError,
  ScanError,
  ConfigError,
  describeCause,
  isLogweaveError,
} from './errors.js';

// Collaborator interfaces (implementations live in @logweave/sources)
export type {
  SourceListing,
  OpenedSource,
  SourceBackend,
  SourceBackendKind,
} from './adapters/index.js';
export { LOG_NAME_SUFFIXES, isLogName } from './adapters/index.js';

// Timestamp Extractor
export type { TimeMatcher } from './time/matchers.js';
export { DEFAULT_TIME_MATCHERS } from './time/matchers.js';
export type { TimeMatch } from './time/extractor.js';
export { TimestampExtractor, fractionToNanos } from './time/extractor.js';

// Line Tagger
export type { TagInput } from './tagging/line-tagger.js';
export {
  SORT_KEY_WIDTH,
  TAG_COLUMN_WIDTH,
  MAX_TAG_NAME_LENGTH,
  compareSortKeys,
  formatSortKey,
  shortenName,
  tagLine,
  renderLine,
} from './tagging/line-tagger.js';

// Per-Source Processor
export type { ScanOptions } from './processing/line-scanner.js';
export { DEFAULT_MAX_LINE_BYTES, scanLines } from './processing/line-scanner.js';
export type { ProcessOptions } from './processing/source-processor.js';
export {
  createRollingTimeState,
  advanceTime,
  processSource,
} from './processing/source-processor.js';

// Aggregator
export type { MergeOptions } from './merge/aggregator.js';
export { mergeSources, listSources, orderTaggedLines } from './merge/aggregator.js';
