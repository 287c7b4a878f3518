import type { TableRef } from '@rowcount-assert/validation'
import { formatTableRef, StorageError } from '@rowcount-assert/validation'

import type { TableStore } from '../types/interfaces.js'

/**
 * Creates a TableStore over fixed row counts, keyed `name` or
 * `namespace.name` (case-insensitive).
 */
export function staticTables(counts: Readonly<Record<string, number>>): TableStore {
  const tables = new Map<string, number>()
  for (const [key, count] of Object.entries(counts)) {
    tables.set(key.toLowerCase(), count)
  }

  const key = (ref: TableRef): string => formatTableRef(ref).toLowerCase()

  return {
    engine: 'static',

    exists(ref) {
      return Promise.resolve(tables.has(key(ref)))
    },

    rowCount(ref) {
      const count = tables.get(key(ref))
      if (count === undefined) {
        return Promise.reject(
          new StorageError(
            { engine: 'static', operation: 'rowCount', table: formatTableRef(ref) },
            new Error(`Unknown table: ${formatTableRef(ref)}`),
          ),
        )
      }
      return Promise.resolve(count)
    },

    ping: () => Promise.resolve(),

    close: () => Promise.resolve(),
  }
}
