import type { EvaluationResult, MessageLevel, Severity } from '@rowcount-assert/validation'
import { CheckError, EXIT_FLOORS, MESSAGE_LEVELS } from '@rowcount-assert/validation'

import type { DebugLogEntry } from '../debug/logger.js'
import type { Evaluation } from '../evaluation/evaluator.js'

// ── Types ──────────────────────────────────────────────────────

export interface Outcome {
  readonly ok: boolean
  readonly expression: string
  /** Severity the outcome was reported with; `error` when the requested one was invalid. */
  readonly severity: Severity
  readonly level: MessageLevel
  readonly error?: CheckError | undefined
  readonly primaryMessage: string
  readonly expressionEcho: string
  readonly substitutedEcho?: string | undefined
  readonly subtotalEcho?: string | undefined
  /** Every line to emit, in order, `primaryMessage` first. */
  readonly lines: readonly string[]
  readonly result?: EvaluationResult | undefined
  readonly exitFloor: number
  /** Abend: the host must terminate the process once the lines are out. */
  readonly fatal: boolean
  readonly debug?: readonly DebugLogEntry[] | undefined
}

export const DEFAULT_SUCCESS_MESSAGE = 'Row count check passed.'

// ── Builders ───────────────────────────────────────────────────

function echoLines(expression: string, evaluation: Evaluation | undefined): string[] {
  const lines = [`Expression: ${expression}`]
  if (evaluation !== undefined) {
    lines.push(`Evaluated: ${evaluation.substituted}`)
    if (evaluation.subtotals !== undefined) lines.push(`Subtotals: ${evaluation.subtotals}`)
  }
  return lines
}

export function buildSuccessOutcome(
  expression: string,
  severity: Severity,
  evaluation: Evaluation,
  successMessage: string = DEFAULT_SUCCESS_MESSAGE,
): Outcome {
  return {
    ok: true,
    expression,
    severity,
    level: 'NOTE',
    primaryMessage: successMessage,
    expressionEcho: expression,
    substitutedEcho: evaluation.substituted,
    subtotalEcho: evaluation.subtotals,
    lines: [successMessage, ...echoLines(expression, evaluation)],
    result: evaluation.result,
    exitFloor: 0,
    fatal: false,
  }
}

export function buildFailureOutcome(
  expression: string,
  severity: Severity,
  error: CheckError,
  evaluation?: Evaluation | undefined,
): Outcome {
  switch (severity) {
    case 'note':
    case 'warning':
    case 'error':
    case 'abend': {
      const primaryMessage = `Row count check failed: ${error.message}`
      return {
        ok: false,
        expression,
        severity,
        level: MESSAGE_LEVELS[severity],
        error,
        primaryMessage,
        expressionEcho: expression,
        substitutedEcho: evaluation?.substituted,
        subtotalEcho: evaluation?.subtotals,
        lines: [primaryMessage, ...echoLines(expression, evaluation)],
        result: evaluation?.result,
        exitFloor: EXIT_FLOORS[severity],
        fatal: severity === 'abend',
      }
    }
    default:
      return internalErrorOutcome(expression, String(severity))
  }
}

function internalErrorOutcome(expression: string, severity: string): Outcome {
  const error = new CheckError({ code: 'INTERNAL_ERROR', severity })
  return {
    ok: false,
    expression,
    severity: 'error',
    level: 'ERROR',
    error,
    primaryMessage: error.message,
    expressionEcho: expression,
    lines: [error.message, ...echoLines(expression, undefined)],
    exitFloor: EXIT_FLOORS.error,
    fatal: false,
  }
}
