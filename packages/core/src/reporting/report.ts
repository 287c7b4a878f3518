import type { ReportHost } from '../types/interfaces.js'
import type { Outcome } from './outcome.js'

/**
 * Hands an outcome to the host: every line at the outcome's level, then the
 * exit-status floor, then, for abend, termination.
 */
export function reportOutcome(outcome: Outcome, host: ReportHost): void {
  for (const line of outcome.lines) {
    host.emit(outcome.level, line)
  }
  if (outcome.exitFloor > 0) host.raiseExitStatus(outcome.exitFloor)
  if (outcome.fatal) host.terminateAbnormally()
}
