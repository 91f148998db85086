/**
 * @logweave/cli
 *
 * The `logweave` command. Exported for embedding and tests; the executable
 * lives in src/bin/logweave.ts.
 *
 * Usage:
 *   logweave --help
 *   logweave https://<host>/.../<bucket>/<prefix>
 *   logweave gs://<bucket>/<prefix>
 *   logweave <path>
 */

export { createProgram } from './commands/index.js'
export { runMerge, type MergeIO } from './commands/merge.js'
export { Reporter } from './output/diagnostics.js'
export { createTheme, type Theme } from './output/theme.js'
