import type { Writable } from 'node:stream'
import { describeCause } from '@logweave/engine'
import type { Theme } from './theme.js'

/**
 * Reporter — everything logweave says on stderr.
 *
 *   error()  one line per fatal failure, always printed
 *   debug()  progress lines, printed only when debugging is on
 *
 * stdout carries merged lines and nothing else.
 */
export class Reporter {
  constructor(
    private readonly stderr: Writable,
    private readonly theme: Theme,
    readonly debugEnabled: boolean,
  ) {}

  error(err: unknown): void {
    this.stderr.write(this.theme.red('logweave:') + ' ' + this.theme.text(describeCause(err)) + '\n')
  }

  debug(message: string): void {
    if (!this.debugEnabled) return
    this.stderr.write(this.theme.muted('logweave: debug:') + ' ' + this.theme.blue(message) + '\n')
  }
}
