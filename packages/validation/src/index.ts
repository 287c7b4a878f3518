// Errors
export type {
  CheckErrorCode,
  CheckErrorDetails,
  ConfigErrorEntry,
  StorageErrorDetails,
  StorageOperation,
} from './errors.js'
export { CheckError, ConfigError, formatTableRef, RowAssertError, StorageError } from './errors.js'

// Formatting
export { insertThousandsSeparators } from './format.js'

// Expression parsing
export { COMPARISON_OPERATORS, parseExpression } from './expression/parser.js'
export { isValidOperand, OPERAND_PATTERN, parseTableRef, validateOperands } from './expression/operands.js'

// Severity
export { DEFAULT_SEVERITY, EXIT_FLOORS, MESSAGE_LEVELS, normalizeSeverity } from './severity.js'

// Types
export type {
  ArithmeticOperator,
  ComparisonOperator,
  EvaluationResult,
  MessageLevel,
  Operand,
  OperandSide,
  OperandTerm,
  ParsedExpression,
  Severity,
  TableRef,
  ValidatedExpression,
} from './types/check.js'
