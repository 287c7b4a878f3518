import type { StorageOperation, TableRef, TableStore } from '@rowcount-assert/core'
import { formatTableRef, StorageError } from '@rowcount-assert/core'
import type { ConnectionOptions } from 'trino-client'
import { Trino } from 'trino-client'

export interface TrinoStoreConfig {
  readonly server: string
  readonly catalog?: string | undefined
  /** Schema for unqualified table names. */
  readonly schema?: string | undefined
  readonly user?: string | undefined
  readonly source?: string | undefined
  readonly timeoutMs?: number | undefined
}

/**
 * Inline a string parameter into Trino SQL as a quoted literal.
 * Single quotes are doubled (Trino's default SQL mode does not use C-style
 * backslash escapes).
 */
export function escapeTrinoValue(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

function rowToObject(columns: string[], row: unknown[]): Record<string, unknown> {
  const obj: Record<string, unknown> = {}
  for (let i = 0; i < columns.length; i++) {
    const col = columns[i]
    if (col !== undefined) {
      obj[col] = row[i]
    }
  }
  return obj
}

export function createTrinoStore(config: TrinoStoreConfig): TableStore {
  const options: ConnectionOptions = {
    server: config.server,
    ...(config.catalog !== undefined ? { catalog: config.catalog } : {}),
    ...(config.schema !== undefined ? { schema: config.schema } : {}),
    ...(config.source !== undefined ? { source: config.source } : {}),
    ...(config.user !== undefined ? { extraHeaders: { 'X-Trino-User': config.user } } : {}),
  }

  const trino = Trino.create(options)

  // Trino folds identifiers to lower case
  const catalogPrefix = config.catalog !== undefined ? `${quoteIdentifier(config.catalog.toLowerCase())}.` : ''

  function inlineParams(sql: string, params: readonly string[]): string {
    let idx = 0
    return sql.replace(/\?/g, () => {
      const value = params[idx]
      idx++
      if (value === undefined) throw new Error(`Missing Trino parameter ${String(idx)}`)
      return escapeTrinoValue(value)
    })
  }

  async function submitAndCollect(sql: string): Promise<Record<string, unknown>[]> {
    const iter = await trino.query(sql)
    const columns: string[] = []
    const allRows: Record<string, unknown>[] = []
    let queryId: string | undefined
    let timer: ReturnType<typeof setTimeout> | undefined

    try {
      if (config.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (queryId !== undefined) trino.cancel(queryId).catch(() => {})
        }, config.timeoutMs)
      }

      for await (const result of iter) {
        queryId = result.id

        if (result.error !== undefined) throw new Error(result.error.message)

        if (result.columns !== undefined && columns.length === 0) {
          for (const col of result.columns) {
            columns.push(col.name)
          }
        }

        if (result.data !== undefined) {
          for (const row of result.data) {
            allRows.push(rowToObject(columns, row))
          }
        }
      }

      return allRows
    } finally {
      if (timer !== undefined) clearTimeout(timer)
    }
  }

  async function query(
    operation: StorageOperation,
    ref: TableRef | undefined,
    sql: string,
    params: readonly string[],
  ): Promise<Record<string, unknown>[]> {
    const table = ref !== undefined ? formatTableRef(ref) : undefined
    try {
      const finalSql = params.length > 0 ? inlineParams(sql, params) : sql
      return await submitAndCollect(finalSql)
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err))
      throw new StorageError({ engine: 'trino', operation, table, sql }, cause)
    }
  }

  function schemaOf(ref: TableRef, operation: StorageOperation): string {
    const schema = ref.namespace ?? config.schema
    if (schema === undefined) {
      throw new StorageError(
        { engine: 'trino', operation, table: formatTableRef(ref) },
        new Error('No schema given and no default schema configured'),
      )
    }
    return schema.toLowerCase()
  }

  return {
    engine: 'trino',

    async exists(ref) {
      const sql = `SELECT count(*) AS n FROM ${catalogPrefix}information_schema.tables WHERE table_schema = ? AND table_name = ?`
      const rows = await query('exists', ref, sql, [schemaOf(ref, 'exists'), ref.name.toLowerCase()])
      return Number(rows[0]?.n) > 0
    },

    async rowCount(ref) {
      const target = `${catalogPrefix}${quoteIdentifier(schemaOf(ref, 'rowCount'))}.${quoteIdentifier(ref.name.toLowerCase())}`
      const rows = await query('rowCount', ref, `SELECT count(*) AS n FROM ${target}`, [])
      return Number(rows[0]?.n)
    },

    async ping() {
      await query('ping', undefined, 'SELECT 1', [])
    },

    async close() {
      // trino-client is HTTP-based: no persistent connection to close
    },
  }
}

export type { TableStore } from '@rowcount-assert/core'
