import { Chalk, supportsColorStderr, type ChalkInstance, type ColorSupportLevel } from 'chalk'

export interface Theme {
  readonly blue:  ChalkInstance
  readonly text:  ChalkInstance
  readonly muted: ChalkInstance
  readonly red:   ChalkInstance
}

export const createTheme = (level: ColorSupportLevel): Theme => {
  const chalk = new Chalk({ level })
  return {
    blue:  chalk.hex('#4FC3F7'),
    text:  chalk.hex('#C8C8C0'),
    muted: chalk.hex('#666666'),
    red:   chalk.hex('#CF6679'),
  }
}

/** Colour level of the terminal attached to stderr, 0 when there is none. */
export const stderrColorLevel = (): ColorSupportLevel =>
  supportsColorStderr === false ? 0 : supportsColorStderr.level
