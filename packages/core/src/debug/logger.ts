// ── Types ──────────────────────────────────────────────────────

export type DebugPhase = 'severity' | 'parse' | 'validation' | 'resolution' | 'evaluation'

export interface DebugLogEntry {
  readonly timestamp: number
  readonly phase: DebugPhase
  readonly message: string
  readonly durationMs: number
  readonly details?: Record<string, unknown> | undefined
}

// ── Helpers ────────────────────────────────────────────────────

export function debugEntry(
  phase: DebugPhase,
  message: string,
  durationMs: number,
  details?: Record<string, unknown> | undefined,
): DebugLogEntry {
  return { timestamp: Date.now(), phase, message, durationMs, details }
}

export function withDebugLog<T extends object>(result: T, debug: boolean, log: readonly DebugLogEntry[]): T {
  return debug ? { ...result, debug: [...log] } : result
}

export function formatDebugEntry(entry: DebugLogEntry): string {
  const details = entry.details !== undefined ? ` ${JSON.stringify(entry.details)}` : ''
  return `[${entry.phase}] ${entry.message} (${entry.durationMs}ms)${details}`
}
