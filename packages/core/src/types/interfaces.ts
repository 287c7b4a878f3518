import type { MessageLevel, TableRef } from '@rowcount-assert/validation'

// --- TableStore (implemented by store packages) ---

/**
 * Row-count source for the tables an expression names.
 *
 * Error contract:
 * - `exists()`, `rowCount()` and `ping()` must throw `StorageError` on any failure.
 * - `rowCount()` resolves to a non-negative integer.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface TableStore {
  readonly engine: string
  exists(ref: TableRef): Promise<boolean>
  rowCount(ref: TableRef): Promise<number>
  ping(): Promise<void>
  close(): Promise<void>
}

// --- ReportHost (implemented by the embedding process) ---

export interface ReportHost {
  emit(level: MessageLevel, text: string): void
  /** Raises the process-wide exit status to at least `minimum`; never lowers it. */
  raiseExitStatus(minimum: number): void
  /** Called only after every line of a fatal outcome was emitted. */
  terminateAbnormally(): never
}
