/**
 * Logweave Engine — Time Matchers
 *
 * The ordered set of patterns the Timestamp Extractor tries. Order matters:
 * patterns anchored at the start of a line come first so that a structured
 * header wins over an unrelated time-shaped substring further along, and
 * within each shape the more precise fraction is tried before the less
 * precise one.
 *
 * Every pattern exposes the named groups `hh`, `mm`, `ss` and, except the
 * bare-seconds pattern, `frac`. The extractor compiles its own global copy
 * of each pattern, so the RegExp objects here are never advanced.
 */

import { TimePrecision } from '../types/timestamp.js';

export interface TimeMatcher {
  /** Short identifier, reported alongside matches for diagnostics. */
  readonly id: string;
  readonly precision: TimePrecision;
  readonly pattern: RegExp;
}

const CLOCK = String.raw`(?<hh>\d{2}):(?<mm>\d{2}):(?<ss>\d{2})`;
const MONTH = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)';

function matcher(id: string, precision: TimePrecision, source: string): TimeMatcher {
  return Object.freeze({ id, precision, pattern: new RegExp(source, 'g') });
}

/**
 * Default matchers, most specific first.
 *
 *   glog-micro    I0101 22:10:34.002031 ...
 *   glog-milli    W0101 22:10:34.002 ...
 *   syslog-micro  Jan  1 22:10:34.002031 ...
 *   syslog-milli  Jan 1 22:10:34.002 ...
 *   logfmt-nano   ... time="2020-01-01T22:10:34.002031939Z" ...
 *   nano          ...22:10:34.002031939...
 *   micro         ...22:10:34.002031...
 *   milli         ...22:10:34.002...
 *   seconds       ...22:10:34...
 */
export const DEFAULT_TIME_MATCHERS: ReadonlyArray<TimeMatcher> = Object.freeze([
  matcher('glog-micro', TimePrecision.Micro, String.raw`^[A-Za-z]\d{4}\s+${CLOCK}\.(?<frac>\d{6})`),
  matcher('glog-milli', TimePrecision.Milli, String.raw`^[A-Za-z]\d{4}\s+${CLOCK}\.(?<frac>\d{3})`),
  matcher('syslog-micro', TimePrecision.Micro, String.raw`^${MONTH}\s+\d{1,2}\s+${CLOCK}\.(?<frac>\d{6})`),
  matcher('syslog-milli', TimePrecision.Milli, String.raw`^${MONTH}\s+\d{1,2}\s+${CLOCK}\.(?<frac>\d{3})`),
  matcher('logfmt-nano', TimePrecision.Nano, String.raw`time="\d{4}-\d{2}-\d{2}T${CLOCK}\.(?<frac>\d{9})Z`),
  matcher('nano', TimePrecision.Nano, String.raw`${CLOCK}\.(?<frac>\d{9})`),
  matcher('micro', TimePrecision.Micro, String.raw`${CLOCK}\.(?<frac>\d{6})`),
  matcher('milli', TimePrecision.Milli, String.raw`${CLOCK}\.(?<frac>\d{3})`),
  matcher('seconds', TimePrecision.Second, CLOCK),
]);
