import type { MessageLevel, TableRef } from '@rowcount-assert/validation'
import { vi } from 'vitest'
import { ExitStatus } from '../../src/host/exitStatus.js'
import { staticTables } from '../../src/store/staticStore.js'
import type { ReportHost, TableStore } from '../../src/types/interfaces.js'

// ── Recording host ─────────────────────────────────────────────

export class AbendSignal extends Error {
  constructor() {
    super('terminated abnormally')
    this.name = 'AbendSignal'
  }
}

export interface RecordingHost extends ReportHost {
  readonly messages: { level: MessageLevel; text: string }[]
  readonly exitStatus: ExitStatus
  terminated: boolean
}

/** Collects emitted lines; `terminateAbnormally()` throws `AbendSignal`. */
export function recordingHost(): RecordingHost {
  const messages: { level: MessageLevel; text: string }[] = []
  const exitStatus = new ExitStatus()
  const host: RecordingHost = {
    messages,
    exitStatus,
    terminated: false,
    emit(level, text) {
      messages.push({ level, text })
    },
    raiseExitStatus(minimum) {
      exitStatus.raiseFloor(minimum)
    },
    terminateAbnormally(): never {
      host.terminated = true
      throw new AbendSignal()
    },
  }
  return host
}

// ── Spy store ──────────────────────────────────────────────────

/** A static store whose calls are recorded. */
export function spyStore(counts: Record<string, number>) {
  const inner = staticTables(counts)
  return {
    engine: 'static',
    exists: vi.fn((ref: TableRef) => inner.exists(ref)),
    rowCount: vi.fn((ref: TableRef) => inner.rowCount(ref)),
    ping: vi.fn(() => inner.ping()),
    close: vi.fn(() => inner.close()),
  } satisfies TableStore
}
