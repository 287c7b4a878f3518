import type { ConfigErrorEntry, TableStore } from '@rowcount-assert/core'
import { ConfigError, staticTables } from '@rowcount-assert/core'
import type { ClickHouseStoreConfig } from '@rowcount-assert/store-clickhouse'
import { createClickHouseStore } from '@rowcount-assert/store-clickhouse'
import type { PostgresStoreConfig } from '@rowcount-assert/store-postgres'
import { createPostgresStore } from '@rowcount-assert/store-postgres'
import type { TrinoStoreConfig } from '@rowcount-assert/store-trino'
import { createTrinoStore } from '@rowcount-assert/store-trino'

// ── Types ──────────────────────────────────────────────────────

export type Engine = 'postgres' | 'clickhouse' | 'trino' | 'static'

export const ENGINES: readonly Engine[] = ['postgres', 'clickhouse', 'trino', 'static']

export interface StoreFlags {
  readonly engine?: string | undefined
  readonly url?: string | undefined
  readonly database?: string | undefined
  readonly schema?: string | undefined
  readonly catalog?: string | undefined
  readonly user?: string | undefined
  readonly counts?: string | undefined
}

export type StoreConfig =
  | { readonly engine: 'postgres'; readonly config: PostgresStoreConfig }
  | { readonly engine: 'clickhouse'; readonly config: ClickHouseStoreConfig }
  | { readonly engine: 'trino'; readonly config: TrinoStoreConfig }
  | { readonly engine: 'static'; readonly counts: Readonly<Record<string, number>> }

export type Env = Readonly<Record<string, string | undefined>>

// ── Helpers ────────────────────────────────────────────────────

function isEngine(value: string): value is Engine {
  return ENGINES.some((engine) => engine === value)
}

/** Parses `name=rows` pairs separated by commas, e.g. `work.orders=12,customers=3`. */
export function parseCounts(list: string): Record<string, number> | ConfigErrorEntry[] {
  const counts: Record<string, number> = {}
  const errors: ConfigErrorEntry[] = []

  for (const pair of list.split(',')) {
    const [name, rows, ...rest] = pair.split('=').map((part) => part.trim())
    if (name === undefined || name === '' || rows === undefined || rest.length > 0 || !/^\d+$/.test(rows)) {
      errors.push({
        code: 'INVALID_OPTION',
        message: `Invalid count '${pair.trim()}'`,
        details: { option: 'counts', expected: 'name=rows', actual: pair.trim() },
      })
      continue
    }
    counts[name] = Number(rows)
  }

  return errors.length > 0 ? errors : counts
}

// ── resolveStoreConfig ─────────────────────────────────────────

/**
 * Flags first, then `ROWCOUNT_ENGINE`, `PG_URL`, `CH_URL` and `TRINO_URL`.
 * Giving `--counts` selects the static engine.
 */
export function resolveStoreConfig(flags: StoreFlags, env: Env): StoreConfig {
  const engine = flags.engine ?? (flags.counts !== undefined ? 'static' : env.ROWCOUNT_ENGINE) ?? 'postgres'

  if (!isEngine(engine)) {
    throw new ConfigError([
      {
        code: 'INVALID_OPTION',
        message: `Unknown engine '${engine}'`,
        details: { option: 'engine', expected: ENGINES.join(' | '), actual: engine },
      },
    ])
  }

  switch (engine) {
    case 'postgres':
      return {
        engine,
        config: {
          connectionString: flags.url ?? env.PG_URL,
          defaultSchema: flags.schema,
        },
      }
    case 'clickhouse':
      return {
        engine,
        config: {
          url: flags.url ?? env.CH_URL,
          database: flags.database,
        },
      }
    case 'trino': {
      const server = flags.url ?? env.TRINO_URL
      if (server === undefined) {
        throw new ConfigError([
          { code: 'MISSING_OPTION', message: 'Trino needs --url or TRINO_URL', details: { option: 'url' } },
        ])
      }
      return {
        engine,
        config: { server, catalog: flags.catalog, schema: flags.schema, user: flags.user },
      }
    }
    case 'static': {
      if (flags.counts === undefined) {
        throw new ConfigError([
          { code: 'MISSING_OPTION', message: 'The static engine needs --counts', details: { option: 'counts' } },
        ])
      }
      const counts = parseCounts(flags.counts)
      if (Array.isArray(counts)) throw new ConfigError(counts)
      return { engine, counts }
    }
  }
}

export function createStore(config: StoreConfig): TableStore {
  switch (config.engine) {
    case 'postgres':
      return createPostgresStore(config.config)
    case 'clickhouse':
      return createClickHouseStore(config.config)
    case 'trino':
      return createTrinoStore(config.config)
    case 'static':
      return staticTables(config.counts)
  }
}
