#!/usr/bin/env node
/**
 * bin/logweave.ts — entry point for the `logweave` command.
 *
 * Wires the Commander program to the real process streams and turns the
 * merge result into the process exit code.
 */

import { createProgram } from '../commands/index.js'

const program = createProgram(
  { stdout: process.stdout, stderr: process.stderr, env: process.env },
  (code) => {
    process.exitCode = code
  },
)

await program.parseAsync()
