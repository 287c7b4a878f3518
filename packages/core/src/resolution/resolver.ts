import type { OperandTerm, ValidatedExpression } from '@rowcount-assert/validation'
import { CheckError, StorageError } from '@rowcount-assert/validation'

import type { TableStore } from '../types/interfaces.js'

// ── Types ──────────────────────────────────────────────────────

export type TableTerm = Extract<OperandTerm, { kind: 'table' }>

/** Row counts keyed by the table term as written in the expression. */
export type RowCounts = ReadonlyMap<string, number>

// ── extractTableRefs ───────────────────────────────────────────

/**
 * Table terms of the LHS, then the RHS, left to right. Repeated names are
 * kept; integer literals are not table references.
 */
export function extractTableRefs(expression: ValidatedExpression): TableTerm[] {
  const tables: TableTerm[] = []
  for (const term of [...expression.lhs.terms, ...expression.rhs.terms]) {
    if (term.kind === 'table') tables.push(term)
  }
  return tables
}

// ── resolveTables ──────────────────────────────────────────────

/**
 * Checks every referenced table exists, then counts each one once.
 *
 * Stops at the first missing table with `TABLE_NOT_FOUND`; in that case no
 * row count is requested. Store failures propagate as `StorageError`.
 */
export async function resolveTables(expression: ValidatedExpression, store: TableStore): Promise<RowCounts | CheckError> {
  const tables = extractTableRefs(expression)

  const checked = new Set<string>()
  for (const table of tables) {
    if (checked.has(table.text)) continue
    checked.add(table.text)

    const found = await callStore(store, 'exists', table.text, () => store.exists(table.ref))
    if (!found) {
      return new CheckError({ code: 'TABLE_NOT_FOUND', table: table.text, ref: table.ref })
    }
  }

  const counts = new Map<string, number>()
  for (const table of tables) {
    if (counts.has(table.text)) continue
    const count = await callStore(store, 'rowCount', table.text, () => store.rowCount(table.ref))
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new StorageError(
        { engine: store.engine, operation: 'rowCount', table: table.text },
        new Error(`Invalid row count: ${String(count)}`),
      )
    }
    counts.set(table.text, count)
  }

  return counts
}

// ── Helpers ────────────────────────────────────────────────────

async function callStore<T>(
  store: TableStore,
  operation: 'exists' | 'rowCount',
  table: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call()
  } catch (err) {
    if (err instanceof StorageError) throw err
    const cause = err instanceof Error ? err : new Error(String(err))
    throw new StorageError({ engine: store.engine, operation, table }, cause)
  }
}
