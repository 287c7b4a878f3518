// --- Severity ---

export type Severity = 'note' | 'warning' | 'error' | 'abend'

export type MessageLevel = 'NOTE' | 'WARNING' | 'ERROR'

// --- Expression ---

export type ComparisonOperator = '=' | '<>' | '>=' | '<=' | '<' | '>'

export type ArithmeticOperator = '+' | '-' | '*'

export type OperandSide = 'lhs' | 'rhs' | 'both'

export interface ParsedExpression {
  readonly lhs: string
  readonly operator: ComparisonOperator
  readonly rhs: string
}

export type OperandTerm =
  | { readonly kind: 'literal'; readonly text: string; readonly value: bigint }
  | { readonly kind: 'table'; readonly text: string; readonly ref: TableRef }

export interface Operand {
  readonly terms: readonly OperandTerm[]
  /** `operators[i]` joins `terms[i]` and `terms[i + 1]`. */
  readonly operators: readonly ArithmeticOperator[]
}

export interface ValidatedExpression {
  readonly lhs: Operand
  readonly operator: ComparisonOperator
  readonly rhs: Operand
}

// --- Tables ---

export interface TableRef {
  readonly namespace?: string | undefined
  readonly name: string
}

export interface EvaluationResult {
  readonly lhsValue: bigint
  readonly rhsValue: bigint
  readonly comparisonHolds: boolean
}
