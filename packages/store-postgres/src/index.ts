import type { StorageOperation, TableRef, TableStore } from '@rowcount-assert/core'
import { formatTableRef, StorageError } from '@rowcount-assert/core'
import type { PoolConfig } from 'pg'
import pg from 'pg'

const { Pool, types } = pg

// COUNT(*) is int8; parse it as a JavaScript number instead of a string
types.setTypeParser(20, Number)

export interface PostgresStoreConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: PoolConfig['ssl'] | undefined
  readonly max?: number | undefined
  readonly timeoutMs?: number | undefined
  /** Schema for unqualified table names. Default: `public`. */
  readonly defaultSchema?: string | undefined
}

const EXISTS_SQL = 'SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2'

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

export function createPostgresStore(config: PostgresStoreConfig): TableStore {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
  })

  // Unquoted identifiers fold to lower case in PostgreSQL
  const defaultSchema = config.defaultSchema ?? 'public'
  const schemaOf = (ref: TableRef): string => (ref.namespace ?? defaultSchema).toLowerCase()

  async function query(
    operation: StorageOperation,
    ref: TableRef | undefined,
    sql: string,
    params: unknown[],
  ): Promise<Record<string, unknown>[]> {
    try {
      const result = await pool.query(sql, params)
      return result.rows
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err))
      const table = ref !== undefined ? formatTableRef(ref) : undefined
      throw new StorageError({ engine: 'postgres', operation, table, sql }, cause)
    }
  }

  return {
    engine: 'postgres',

    async exists(ref) {
      const rows = await query('exists', ref, EXISTS_SQL, [schemaOf(ref), ref.name.toLowerCase()])
      return rows.length > 0
    },

    async rowCount(ref) {
      const sql = `SELECT COUNT(*) AS n FROM ${quoteIdentifier(schemaOf(ref))}.${quoteIdentifier(ref.name.toLowerCase())}`
      const rows = await query('rowCount', ref, sql, [])
      return Number(rows[0]?.n)
    },

    async ping() {
      await query('ping', undefined, 'SELECT 1', [])
    },

    async close() {
      await pool.end()
    },
  }
}

export type { TableStore } from '@rowcount-assert/core'
