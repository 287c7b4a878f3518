import { CheckError } from './errors.js'
import type { MessageLevel, Severity } from './types/check.js'

// ── Severity Constants ─────────────────────────────────────────

export const DEFAULT_SEVERITY: Severity = 'error'

const SEVERITY_ALIASES: ReadonlyMap<string, Severity> = new Map([
  ['note', 'note'],
  ['warning', 'warning'],
  ['warn', 'warning'],
  ['error', 'error'],
  ['err', 'error'],
  ['abend', 'abend'],
  ['abort', 'abend'],
])

/** Minimum process exit status a failed check raises, per severity. */
export const EXIT_FLOORS: Readonly<Record<Severity, number>> = {
  note: 0,
  warning: 4,
  error: 8,
  abend: 8,
}

export const MESSAGE_LEVELS: Readonly<Record<Severity, MessageLevel>> = {
  note: 'NOTE',
  warning: 'WARNING',
  error: 'ERROR',
  abend: 'ERROR',
}

// ── normalizeSeverity ──────────────────────────────────────────

/**
 * Maps a requested severity (case-insensitive, synonyms allowed) to its
 * canonical form. Absent input means `error`.
 */
export function normalizeSeverity(input?: string | undefined): Severity | CheckError {
  if (input === undefined) return DEFAULT_SEVERITY
  const severity = SEVERITY_ALIASES.get(input.trim().toLowerCase())
  if (severity === undefined) {
    return new CheckError({ code: 'INVALID_SEVERITY', input })
  }
  return severity
}
