import type { ComparisonOperator, Operand, OperandTerm } from '@rowcount-assert/validation'
import { insertThousandsSeparators } from '@rowcount-assert/validation'

export { insertThousandsSeparators }

export function formatOperand(operand: Operand, render: (term: OperandTerm) => string): string {
  let out = ''
  for (let i = 0; i < operand.terms.length; i++) {
    const term = operand.terms[i]
    if (term === undefined) continue
    const op = operand.operators[i - 1]
    out += op !== undefined ? ` ${op} ${render(term)}` : render(term)
  }
  return out
}

export function formatComparison(lhs: string, operator: ComparisonOperator, rhs: string, commas: boolean): string {
  const line = `${lhs} ${operator} ${rhs}`
  return commas ? insertThousandsSeparators(line) : line
}
