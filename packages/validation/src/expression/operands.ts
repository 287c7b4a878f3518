import { CheckError } from '../errors.js'
import type {
  ArithmeticOperator,
  Operand,
  OperandTerm,
  ParsedExpression,
  TableRef,
  ValidatedExpression,
} from '../types/check.js'

// ── Operand Grammar ────────────────────────────────────────────

const NAMESPACE = '[A-Za-z_]\\w{0,8}'
const NAME = '[A-Za-z_]\\w{0,32}'
const TERM = `(?:(?:${NAMESPACE}\\.)?${NAME}|\\d+)`

export const OPERAND_PATTERN = new RegExp(`^\\s*(?:${TERM}\\s*[+\\-*]\\s*)*${TERM}\\s*$`)

// Only applied to operands that already matched OPERAND_PATTERN.
const TOKEN_PATTERN = /(?:[A-Za-z_]\w*\.)?[A-Za-z_]\w*|\d+|[+\-*]/g

export function isValidOperand(operand: string): boolean {
  return OPERAND_PATTERN.test(operand)
}

export function parseTableRef(text: string): TableRef {
  const dot = text.indexOf('.')
  if (dot === -1) return { name: text }
  return { namespace: text.slice(0, dot), name: text.slice(dot + 1) }
}

function isArithmeticOperator(token: string): token is ArithmeticOperator {
  return token === '+' || token === '-' || token === '*'
}

function toOperand(text: string): Operand {
  const terms: OperandTerm[] = []
  const operators: ArithmeticOperator[] = []

  for (const [token] of text.matchAll(TOKEN_PATTERN)) {
    if (isArithmeticOperator(token)) {
      operators.push(token)
    } else if (/^\d+$/.test(token)) {
      terms.push({ kind: 'literal', text: token, value: BigInt(token) })
    } else {
      terms.push({ kind: 'table', text: token, ref: parseTableRef(token) })
    }
  }

  return { terms, operators }
}

// ── validateOperands ───────────────────────────────────────────

export function validateOperands(parsed: ParsedExpression): ValidatedExpression | CheckError {
  const lhsValid = isValidOperand(parsed.lhs)
  const rhsValid = isValidOperand(parsed.rhs)

  if (!lhsValid || !rhsValid) {
    const side = !lhsValid && !rhsValid ? 'both' : lhsValid ? 'rhs' : 'lhs'
    return new CheckError({ code: 'INVALID_OPERAND', side, lhs: parsed.lhs, rhs: parsed.rhs })
  }

  return {
    lhs: toOperand(parsed.lhs),
    operator: parsed.operator,
    rhs: toOperand(parsed.rhs),
  }
}
