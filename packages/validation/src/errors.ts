import { insertThousandsSeparators } from './format.js'
import type { ComparisonOperator, OperandSide, Severity, TableRef } from './types/check.js'

// --- Base Error ---

export class RowAssertError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RowAssertError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Check Error ---

export type CheckErrorDetails =
  | { code: 'INVALID_SEVERITY'; input: string }
  | { code: 'MALFORMED_EXPRESSION'; expression: string }
  | { code: 'INVALID_OPERAND'; side: OperandSide; lhs: string; rhs: string }
  | { code: 'TABLE_NOT_FOUND'; table: string; ref: TableRef }
  | {
      code: 'EXPRESSION_FALSE'
      lhsValue: bigint
      operator: ComparisonOperator
      rhsValue: bigint
      /** Thousands separators in the message, as in the echoes. */
      commas: boolean
    }
  | { code: 'INTERNAL_ERROR'; severity: string }

export type CheckErrorCode = CheckErrorDetails['code']

/**
 * A check that did not pass. Stages return it instead of throwing; the
 * pipeline turns it into a reported outcome.
 */
export class CheckError extends RowAssertError {
  declare readonly code: CheckErrorCode
  readonly details: CheckErrorDetails

  constructor(details: CheckErrorDetails) {
    super(details.code, defaultCheckMessage(details))
    this.name = 'CheckError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    const details: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(this.details)) {
      // JSON has no bigint
      details[key] = typeof value === 'bigint' ? value.toString() : value
    }
    return {
      ...super.toJSON(),
      details,
    }
  }
}

// --- Storage Error ---

export type StorageOperation = 'exists' | 'rowCount' | 'ping'

export interface StorageErrorDetails {
  engine: string
  operation: StorageOperation
  table?: string | undefined
  sql?: string | undefined
}

export class StorageError extends RowAssertError {
  declare readonly code: 'STORAGE_UNAVAILABLE'
  readonly details: StorageErrorDetails

  constructor(details: StorageErrorDetails, cause?: Error | undefined) {
    super('STORAGE_UNAVAILABLE', defaultStorageMessage(details), cause ? { cause } : undefined)
    this.name = 'StorageError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code: 'INVALID_OPTION' | 'MISSING_OPTION'
  message: string
  details: {
    option: string
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends RowAssertError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Helpers ---

export function formatTableRef(ref: TableRef): string {
  return ref.namespace !== undefined ? `${ref.namespace}.${ref.name}` : ref.name
}

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof RowAssertError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function defaultCheckMessage(details: CheckErrorDetails): string {
  switch (details.code) {
    case 'INVALID_SEVERITY':
      return `Invalid severity '${details.input}': expected one of note, warning, error, abend`
    case 'MALFORMED_EXPRESSION':
      return `Malformed expression '${details.expression}': expected <operand> <comparator> <operand> with one of =, <>, >=, <=, <, >`
    case 'INVALID_OPERAND':
      if (details.side === 'both') {
        return `Invalid operands on both sides: '${details.lhs.trim()}' and '${details.rhs.trim()}'`
      }
      if (details.side === 'lhs') {
        return `Invalid left-hand operand '${details.lhs.trim()}'`
      }
      return `Invalid right-hand operand '${details.rhs.trim()}'`
    case 'TABLE_NOT_FOUND':
      return `Table '${details.table}' does not exist`
    case 'EXPRESSION_FALSE': {
      const comparison = `${details.lhsValue} ${details.operator} ${details.rhsValue}`
      return `Expression is false: ${details.commas ? insertThousandsSeparators(comparison) : comparison}`
    }
    case 'INTERNAL_ERROR':
      return `Internal error: unrecognized severity '${details.severity}'`
  }
}

function defaultStorageMessage(details: StorageErrorDetails): string {
  const target = details.table !== undefined ? ` for table ${details.table}` : ''
  return `Storage unavailable: ${details.operation} failed on ${details.engine}${target}`
}
