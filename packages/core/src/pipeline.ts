import type { Severity } from '@rowcount-assert/validation'
import {
  CheckError,
  normalizeSeverity,
  parseExpression,
  validateOperands,
} from '@rowcount-assert/validation'

import type { DebugLogEntry } from './debug/logger.js'
import { debugEntry, withDebugLog } from './debug/logger.js'
import type { Evaluation } from './evaluation/evaluator.js'
import { evaluate } from './evaluation/evaluator.js'
import { normalizeCommas } from './options.js'
import type { Outcome } from './reporting/outcome.js'
import { buildFailureOutcome, buildSuccessOutcome } from './reporting/outcome.js'
import { reportOutcome } from './reporting/report.js'
import { resolveTables } from './resolution/resolver.js'
import type { ReportHost, TableStore } from './types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export interface CheckOptions {
  /** `note`, `warning`/`warn`, `error`/`err` or `abend`/`abort`; defaults to `error`. */
  readonly severity?: string | undefined
  readonly successMessage?: string | undefined
  /** Thousands separators in echoed counts; defaults to on. */
  readonly commas?: boolean | string | undefined
  readonly debug?: boolean | undefined
}

export interface CreateRowAssertOptions {
  readonly store: TableStore
  readonly host: ReportHost
}

export interface RowAssert {
  /** Runs the check and returns its outcome without reporting it. */
  check(expression: string, options?: CheckOptions): Promise<Outcome>
  /** Runs the check and reports it through the host. Does not return on abend. */
  assert(expression: string, options?: CheckOptions): Promise<Outcome>
  close(): Promise<void>
}

// ── createRowAssert ────────────────────────────────────────────

export function createRowAssert(options: CreateRowAssertOptions): RowAssert {
  const { store, host } = options

  return {
    check(expression, checkOptions = {}) {
      return checkRowCounts(expression, store, checkOptions)
    },

    async assert(expression, checkOptions = {}) {
      const outcome = await checkRowCounts(expression, store, checkOptions)
      reportOutcome(outcome, host)
      return outcome
    },

    async close() {
      await store.close()
    },
  }
}

// ── Check Pipeline ─────────────────────────────────────────────

/**
 * Severity → parse → operands → tables → evaluation. Every check failure
 * becomes a failure outcome; only `StorageError` and `ConfigError` throw.
 */
export async function checkRowCounts(expression: string, store: TableStore, options: CheckOptions = {}): Promise<Outcome> {
  const log: DebugLogEntry[] = []
  const debug = options.debug === true
  const commas = normalizeCommas(options.commas)

  const fail = (severity: Severity, error: CheckError, evaluation?: Evaluation): Outcome =>
    withDebugLog(buildFailureOutcome(expression, severity, error, evaluation), debug, log)

  // 1. Severity
  const t0 = Date.now()
  const severity = normalizeSeverity(options.severity)
  if (severity instanceof CheckError) return fail('error', severity)
  if (debug) log.push(debugEntry('severity', `Severity: ${severity}`, Date.now() - t0))

  // 2. Parse
  const t1 = Date.now()
  const parsed = parseExpression(expression)
  if (parsed instanceof CheckError) return fail(severity, parsed)
  if (debug) log.push(debugEntry('parse', `Comparator: ${parsed.operator}`, Date.now() - t1))

  // 3. Validate operands
  const t2 = Date.now()
  const validated = validateOperands(parsed)
  if (validated instanceof CheckError) return fail(severity, validated)
  if (debug) log.push(debugEntry('validation', 'Operands valid', Date.now() - t2))

  // 4. Resolve and count tables
  const t3 = Date.now()
  const counts = await resolveTables(validated, store)
  if (counts instanceof CheckError) return fail(severity, counts)
  if (debug) {
    log.push(
      debugEntry('resolution', `Counted (${counts.size} tables)`, Date.now() - t3, {
        engine: store.engine,
        counts: Object.fromEntries(counts),
      }),
    )
  }

  // 5. Evaluate
  const t4 = Date.now()
  const evaluation = evaluate(validated, counts, commas)
  if (debug) log.push(debugEntry('evaluation', `Evaluated: ${evaluation.substituted}`, Date.now() - t4))

  const { lhsValue, rhsValue, comparisonHolds } = evaluation.result
  if (!comparisonHolds) {
    const error = new CheckError({
      code: 'EXPRESSION_FALSE',
      lhsValue,
      operator: validated.operator,
      rhsValue,
      commas,
    })
    return fail(severity, error, evaluation)
  }

  return withDebugLog(buildSuccessOutcome(expression, severity, evaluation, options.successMessage), debug, log)
}
