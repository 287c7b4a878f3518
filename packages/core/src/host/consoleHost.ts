import { writeSync } from 'node:fs'
import type { MessageLevel } from '@rowcount-assert/validation'

import type { ReportHost } from '../types/interfaces.js'
import { ExitStatus } from './exitStatus.js'

export interface ConsoleHostOptions {
  readonly exitStatus?: ExitStatus | undefined
  /** Defaults to a synchronous write: NOTE to stdout, the rest to stderr. */
  readonly write?: ((level: MessageLevel, line: string) => void) | undefined
  readonly exit?: ((code: number) => never) | undefined
}

export interface ConsoleHost extends ReportHost {
  readonly exitStatus: ExitStatus
}

function writeLine(level: MessageLevel, line: string): void {
  writeSync(level === 'NOTE' ? 1 : 2, `${line}\n`)
}

export function createConsoleHost(options: ConsoleHostOptions = {}): ConsoleHost {
  const exitStatus = options.exitStatus ?? new ExitStatus()
  const write = options.write ?? writeLine
  const exit = options.exit ?? ((code: number) => process.exit(code))

  return {
    exitStatus,

    emit(level, text) {
      write(level, `${level}: ${text}`)
    },

    raiseExitStatus(minimum) {
      process.exitCode = exitStatus.raiseFloor(minimum)
    },

    terminateAbnormally() {
      // Default writes are synchronous: nothing is left buffered here.
      return exit(Math.max(exitStatus.current, 1))
    },
  }
}
