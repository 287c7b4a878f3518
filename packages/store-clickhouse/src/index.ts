import { createClient } from '@clickhouse/client'
import type { StorageOperation, TableRef, TableStore } from '@rowcount-assert/core'
import { formatTableRef, StorageError } from '@rowcount-assert/core'

export interface ClickHouseStoreConfig {
  readonly url?: string | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  /** Database for unqualified table names. Default: `default`. */
  readonly database?: string | undefined
  readonly timeoutMs?: number | undefined
}

const EXISTS_SQL = 'SELECT count() AS n FROM system.tables WHERE database = {p1:String} AND name = {p2:String}'

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``
}

export function createClickHouseStore(config: ClickHouseStoreConfig): TableStore {
  const settings: Record<string, number | string | boolean> = {}
  if (config.timeoutMs !== undefined) {
    settings.max_execution_time = Math.ceil(config.timeoutMs / 1000)
  }

  const client = createClient({
    url: config.url,
    username: config.username,
    password: config.password,
    database: config.database,
    clickhouse_settings: settings,
  })

  const databaseOf = (ref: TableRef): string => ref.namespace ?? config.database ?? 'default'

  async function query(
    operation: StorageOperation,
    ref: TableRef,
    sql: string,
    params: unknown[],
  ): Promise<Record<string, unknown>[]> {
    try {
      const queryParams: Record<string, unknown> = {}
      for (let i = 0; i < params.length; i++) {
        queryParams[`p${String(i + 1)}`] = params[i]
      }

      const result = await client.query({
        query: sql,
        query_params: queryParams,
        format: 'JSONEachRow',
      })

      return await result.json<Record<string, unknown>>()
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err))
      throw new StorageError({ engine: 'clickhouse', operation, table: formatTableRef(ref), sql }, cause)
    }
  }

  return {
    engine: 'clickhouse',

    async exists(ref) {
      const rows = await query('exists', ref, EXISTS_SQL, [databaseOf(ref), ref.name])
      // UInt64 arrives as a string in JSON output
      return Number(rows[0]?.n) > 0
    },

    async rowCount(ref) {
      const sql = `SELECT count() AS n FROM ${quoteIdentifier(databaseOf(ref))}.${quoteIdentifier(ref.name)}`
      const rows = await query('rowCount', ref, sql, [])
      return Number(rows[0]?.n)
    },

    async ping() {
      try {
        const result = await client.ping()
        if (!result.success) {
          throw new StorageError({ engine: 'clickhouse', operation: 'ping' })
        }
      } catch (err) {
        if (err instanceof StorageError) throw err
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new StorageError({ engine: 'clickhouse', operation: 'ping' }, cause)
      }
    },

    async close() {
      await client.close()
    },
  }
}

export type { TableStore } from '@rowcount-assert/core'
