// Re-export types from validation package
export type {
  CheckErrorCode,
  CheckErrorDetails,
  ComparisonOperator,
  ConfigErrorEntry,
  EvaluationResult,
  MessageLevel,
  Operand,
  OperandTerm,
  ParsedExpression,
  Severity,
  StorageErrorDetails,
  StorageOperation,
  TableRef,
  ValidatedExpression,
} from '@rowcount-assert/validation'
// Re-export validation functions and classes
export {
  CheckError,
  ConfigError,
  formatTableRef,
  normalizeSeverity,
  parseExpression,
  RowAssertError,
  StorageError,
  validateOperands,
} from '@rowcount-assert/validation'
// Debug
export type { DebugLogEntry, DebugPhase } from './debug/logger.js'
export { debugEntry, formatDebugEntry, withDebugLog } from './debug/logger.js'
// Evaluation
export type { Evaluation } from './evaluation/evaluator.js'
export { compare, evaluate, evaluateOperand } from './evaluation/evaluator.js'
// Host
export type { ConsoleHost, ConsoleHostOptions } from './host/consoleHost.js'
export { createConsoleHost } from './host/consoleHost.js'
export { ExitStatus } from './host/exitStatus.js'
export { normalizeCommas } from './options.js'
// Pipeline
export type { CheckOptions, CreateRowAssertOptions, RowAssert } from './pipeline.js'
export { checkRowCounts, createRowAssert } from './pipeline.js'
// Reporting
export { insertThousandsSeparators } from './reporting/format.js'
export type { Outcome } from './reporting/outcome.js'
export { buildFailureOutcome, buildSuccessOutcome, DEFAULT_SUCCESS_MESSAGE } from './reporting/outcome.js'
export { reportOutcome } from './reporting/report.js'
// Resolution
export type { RowCounts, TableTerm } from './resolution/resolver.js'
export { extractTableRefs, resolveTables } from './resolution/resolver.js'
// Static store helper
export { staticTables } from './store/staticStore.js'
// Public interfaces
export type { ReportHost, TableStore } from './types/interfaces.js'
