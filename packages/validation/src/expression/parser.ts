import { CheckError } from '../errors.js'
import type { ComparisonOperator, ParsedExpression } from '../types/check.js'

// ── Expression Shape ───────────────────────────────────────────

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['<>', '>=', '<=', '=', '<', '>']

// Operand characters exclude `<`, `>` and `=`, so a second comparator can
// never be absorbed into either side. The lazy LHS splits on the first
// comparator; `<>` is listed before `<` and `>`.
const EXPRESSION_PATTERN = /^([\s\w+\-*.]+?)(<>|>=|<=|=|<|>)([\s\w+\-*.]+)$/

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((op) => op === value)
}

// ── parseExpression ────────────────────────────────────────────

export function parseExpression(expression: string): ParsedExpression | CheckError {
  const match = EXPRESSION_PATTERN.exec(expression)
  const lhs = match?.[1]
  const operator = match?.[2]
  const rhs = match?.[3]

  if (lhs === undefined || operator === undefined || rhs === undefined || !isComparisonOperator(operator)) {
    return new CheckError({ code: 'MALFORMED_EXPRESSION', expression })
  }

  return { lhs, operator, rhs }
}
