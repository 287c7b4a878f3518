import type {
  ArithmeticOperator,
  ComparisonOperator,
  EvaluationResult,
  Operand,
  OperandTerm,
  ValidatedExpression,
} from '@rowcount-assert/validation'
import { RowAssertError } from '@rowcount-assert/validation'

import { formatComparison, formatOperand } from '../reporting/format.js'
import type { RowCounts, TableTerm } from '../resolution/resolver.js'

// ── Types ──────────────────────────────────────────────────────

export interface Evaluation {
  readonly result: EvaluationResult
  /** Comparison with every table replaced by its row count, e.g. `5 + 5 = 10`. */
  readonly substituted: string
  /** `lhsValue op rhsValue`; set only when a side references more than one table. */
  readonly subtotals?: string | undefined
}

// ── Arithmetic ─────────────────────────────────────────────────

function rowCountOf(term: TableTerm, counts: RowCounts): number {
  const count = counts.get(term.text)
  if (count === undefined) {
    throw new RowAssertError('INTERNAL_ERROR', `No row count resolved for table '${term.text}'`)
  }
  return count
}

function termValue(term: OperandTerm, counts: RowCounts): bigint {
  return term.kind === 'literal' ? term.value : BigInt(rowCountOf(term, counts))
}

/**
 * Exact integer value of an operand: `*` binds tighter than `+` and `-`,
 * equal precedence associates left to right.
 */
export function evaluateOperand(operand: Operand, counts: RowCounts): bigint {
  let sum = 0n
  let sign = 1n
  let product = 1n
  let pending: ArithmeticOperator = '*'

  for (let i = 0; i < operand.terms.length; i++) {
    const term = operand.terms[i]
    if (term === undefined) continue
    const value = termValue(term, counts)
    if (pending === '*') {
      product *= value
    } else {
      sum += sign * product
      sign = pending === '+' ? 1n : -1n
      product = value
    }
    pending = operand.operators[i] ?? '*'
  }

  return sum + sign * product
}

export function compare(lhs: bigint, operator: ComparisonOperator, rhs: bigint): boolean {
  switch (operator) {
    case '=':
      return lhs === rhs
    case '<>':
      return lhs !== rhs
    case '>=':
      return lhs >= rhs
    case '<=':
      return lhs <= rhs
    case '<':
      return lhs < rhs
    case '>':
      return lhs > rhs
  }
}

// ── evaluate ───────────────────────────────────────────────────

function tableCount(operand: Operand): number {
  return operand.terms.filter((t) => t.kind === 'table').length
}

export function evaluate(expression: ValidatedExpression, counts: RowCounts, commas: boolean): Evaluation {
  const lhsValue = evaluateOperand(expression.lhs, counts)
  const rhsValue = evaluateOperand(expression.rhs, counts)
  const comparisonHolds = compare(lhsValue, expression.operator, rhsValue)

  // Literals echo as written
  const substitute = (term: OperandTerm): string =>
    term.kind === 'literal' ? term.text : String(rowCountOf(term, counts))
  const substituted = formatComparison(
    formatOperand(expression.lhs, substitute),
    expression.operator,
    formatOperand(expression.rhs, substitute),
    commas,
  )

  const split = tableCount(expression.lhs) > 1 || tableCount(expression.rhs) > 1
  const subtotals = split
    ? formatComparison(String(lhsValue), expression.operator, String(rhsValue), commas)
    : undefined

  return {
    result: { lhsValue, rhsValue, comparisonHolds },
    substituted,
    subtotals,
  }
}
