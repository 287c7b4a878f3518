import { ConfigError } from '@rowcount-assert/validation'

const YES = new Set(['yes', 'y', 'true', '1'])
const NO = new Set(['no', 'n', 'false', '0'])

/** Reads the `commas` display option; absent means on. */
export function normalizeCommas(value: boolean | string | undefined): boolean {
  if (value === undefined) return true
  if (typeof value === 'boolean') return value

  const normalized = value.trim().toLowerCase()
  if (YES.has(normalized)) return true
  if (NO.has(normalized)) return false

  throw new ConfigError([
    {
      code: 'INVALID_OPTION',
      message: `Invalid commas option '${value}'`,
      details: { option: 'commas', expected: 'yes | no', actual: value },
    },
  ])
}
