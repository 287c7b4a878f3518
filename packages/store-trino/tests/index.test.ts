import { StorageError } from '@rowcount-assert/core'
import type { QueryResult } from 'trino-client'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createTrinoStore, escapeTrinoValue, quoteIdentifier } from '../src/index.js'

// ── Mock trino-client ──────────────────────────────────────────

const mockQuery = vi.fn()
const mockCancel = vi.fn()

vi.mock('trino-client', () => ({
  Trino: {
    create: () => ({ query: mockQuery, cancel: mockCancel }),
  },
}))

/** Create an async iterable from an array of QueryResult pages. */
function asyncIter(results: QueryResult[]): AsyncIterable<QueryResult> {
  return {
    [Symbol.asyncIterator]: async function* () {
      for (const r of results) yield r
    },
  }
}

function trinoOk(data: unknown[][], columns: string[]): QueryResult {
  return {
    id: 'q1',
    columns: columns.map((name) => ({ name, type: 'bigint' })),
    data,
  }
}

function trinoError(message: string): QueryResult {
  return {
    id: 'q1',
    error: {
      message,
      errorCode: 1,
      errorName: 'GENERIC_INTERNAL_ERROR',
      errorType: 'INTERNAL_ERROR',
      failureInfo: { type: 'error', message, suppressed: [], stack: [] },
    },
  }
}

// ── Tests ──────────────────────────────────────────────────────

describe('store-trino', () => {
  const store = createTrinoStore({ server: 'http://trino:8080', catalog: 'hive', schema: 'sales' })

  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('exists()', () => {
    it('inlines schema and table into the information_schema lookup', async () => {
      mockQuery.mockResolvedValue(asyncIter([trinoOk([[1]], ['n'])]))

      await expect(store.exists({ name: 'Orders' })).resolves.toBe(true)
      expect(mockQuery).toHaveBeenCalledWith(
        `SELECT count(*) AS n FROM "hive".information_schema.tables WHERE table_schema = 'sales' AND table_name = 'orders'`,
      )
    })

    it('doubles single quotes in inlined names', async () => {
      mockQuery.mockResolvedValue(asyncIter([trinoOk([[0]], ['n'])]))

      await store.exists({ namespace: 'Q', name: "O'Brien" })
      expect(mockQuery).toHaveBeenCalledWith(
        `SELECT count(*) AS n FROM "hive".information_schema.tables WHERE table_schema = 'q' AND table_name = 'o''brien'`,
      )
    })

    it('is false when no table matches', async () => {
      mockQuery.mockResolvedValue(asyncIter([trinoOk([[0]], ['n'])]))
      await expect(store.exists({ namespace: 'raw', name: 'orders' })).resolves.toBe(false)
    })

    it('requires a schema for unqualified names', async () => {
      const bare = createTrinoStore({ server: 'http://trino:8080' })

      await expect(bare.exists({ name: 'orders' })).rejects.toBeInstanceOf(StorageError)
      expect(mockQuery).not.toHaveBeenCalled()
    })
  })

  describe('rowCount()', () => {
    it('counts the catalog-qualified table', async () => {
      mockQuery.mockResolvedValue(asyncIter([trinoOk([[17]], ['n'])]))

      await expect(store.rowCount({ namespace: 'raw', name: 'orders' })).resolves.toBe(17)
      expect(mockQuery).toHaveBeenCalledWith('SELECT count(*) AS n FROM "hive"."raw"."orders"')
    })

    it('collects rows across pages', async () => {
      mockQuery.mockResolvedValue(
        asyncIter([{ id: 'q1', columns: [{ name: 'n', type: 'bigint' }], data: [] }, { id: 'q1', data: [[5]] }]),
      )

      await expect(store.rowCount({ name: 'orders' })).resolves.toBe(5)
    })
  })

  describe('errors', () => {
    it('Trino error response throws StorageError', async () => {
      mockQuery.mockResolvedValue(asyncIter([trinoError('Table not found')]))

      try {
        await store.rowCount({ name: 'bad_table' })
        expect.fail('Expected StorageError')
      } catch (err) {
        expect(err).toBeInstanceOf(StorageError)
        const e = err as StorageError
        expect(e.details).toMatchObject({ engine: 'trino', operation: 'rowCount', table: 'bad_table' })
        expect((e.cause as Error).message).toBe('Table not found')
      }
    })

    it('network error throws StorageError', async () => {
      mockQuery.mockRejectedValue(new Error('connect ECONNREFUSED'))

      await expect(store.ping()).rejects.toMatchObject({
        code: 'STORAGE_UNAVAILABLE',
        details: { engine: 'trino', operation: 'ping' },
      })
    })
  })

  it('quoteIdentifier doubles embedded quotes', () => {
    expect(quoteIdentifier('a"b')).toBe('"a""b"')
  })

  it('close() resolves without error (stateless)', async () => {
    await expect(store.close()).resolves.toBeUndefined()
  })
})

describe('escapeTrinoValue', () => {
  it('quotes a string literal', () => {
    expect(escapeTrinoValue('orders')).toBe("'orders'")
    expect(escapeTrinoValue("it's")).toBe("'it''s'")
  })
})
