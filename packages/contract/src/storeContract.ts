import type { TableRef, TableStore } from '@rowcount-assert/core'
import { checkRowCounts, formatTableRef, StorageError } from '@rowcount-assert/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface StoreContractConfig {
  /** A table the store can see, holding exactly `expectedRows` rows. */
  readonly existingTable: TableRef
  readonly expectedRows: number
  /** A table the store cannot see (e.g. `{ name: '__nonexistent_table_xyz__' }`). */
  readonly missingTable: TableRef
}

// ── describeTableStoreContract ─────────────────────────────────

export function describeTableStoreContract(
  name: string,
  factory: () => TableStore,
  config: StoreContractConfig,
): void {
  describe(`TableStoreContract: ${name}`, () => {
    let store: TableStore

    beforeAll(() => {
      store = factory()
    })

    afterAll(async () => {
      await store?.close()
    })

    it('C100: ping() resolves for a healthy store', async () => {
      await expect(store.ping()).resolves.toBeUndefined()
    })

    it('C101: exists() is true for a visible table', async () => {
      await expect(store.exists(config.existingTable)).resolves.toBe(true)
    })

    it('C102: exists() is false for a missing table', async () => {
      await expect(store.exists(config.missingTable)).resolves.toBe(false)
    })

    it('C103: rowCount() returns the exact non-negative integer', async () => {
      const count = await store.rowCount(config.existingTable)
      expect(Number.isSafeInteger(count)).toBe(true)
      expect(count).toBe(config.expectedRows)
    })

    it('C104: rowCount() throws StorageError for a missing table', async () => {
      try {
        await store.rowCount(config.missingTable)
        expect.fail('Expected StorageError')
      } catch (err) {
        expect(err).toBeInstanceOf(StorageError)
        if (err instanceof StorageError) {
          expect(err.code).toBe('STORAGE_UNAVAILABLE')
          expect(err.details.engine).toBe(store.engine)
        }
      }
    })

    it('C105: a check against the store passes end to end', async () => {
      const table = formatTableRef(config.existingTable)
      const outcome = await checkRowCounts(`${table} = ${config.expectedRows}`, store, { commas: false })
      expect(outcome.ok).toBe(true)
      expect(outcome.substitutedEcho).toBe(`${config.expectedRows} = ${config.expectedRows}`)
    })

    it('C106: a check naming a missing table reports TABLE_NOT_FOUND', async () => {
      const outcome = await checkRowCounts(`${formatTableRef(config.missingTable)} = 0`, store)
      expect(outcome.ok).toBe(false)
      expect(outcome.error?.code).toBe('TABLE_NOT_FOUND')
    })

    it('C107: close() resolves without error', async () => {
      const temp = factory()
      await expect(temp.close()).resolves.toBeUndefined()
    })
  })
}
