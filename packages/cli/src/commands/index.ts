/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/logweave.ts   (process entry point)
 *   test/program.test.ts  (argument handling with injected streams)
 */

import { Command } from 'commander'
import { runMerge, type MergeIO } from './merge.js'

export function createProgram(io: MergeIO, onExit: (code: number) => void): Command {
  return new Command('logweave')
    .description(
      'Merge the log files under a bucket URL or local path into one stream,\n' +
      'ordered by the timestamp found on each line.',
    )
    .version('0.1.0')
    .argument('<locator>', 'http(s)/gs:// bucket location, or a local file or directory')
    .action(async (locator: string) => {
      onExit(await runMerge(locator, io))
    })
}
