/**
 * rowcount-assert CLI: checks a comparison of table row counts and reports
 * it at the requested severity, e.g.
 *
 * ```
 * rowcount-assert "work.orders >= customers * 2" --severity warning
 * ```
 */

import type { ReportHost, TableStore } from '@rowcount-assert/core'
import { ConfigError, createConsoleHost, createRowAssert, formatDebugEntry, StorageError } from '@rowcount-assert/core'
import { Command } from 'commander'

import type { Env, StoreConfig } from './config.js'
import { createStore, ENGINES, resolveStoreConfig } from './config.js'

export const VERSION = '0.1.0'

/** Exit status for problems outside the check itself: bad options or an unreachable store. */
export const SETUP_FAILURE_STATUS = 8

export interface CliOptions {
  readonly severity: string
  readonly successMsg?: string | undefined
  readonly commas: string
  readonly engine?: string | undefined
  readonly url?: string | undefined
  readonly database?: string | undefined
  readonly schema?: string | undefined
  readonly catalog?: string | undefined
  readonly user?: string | undefined
  readonly counts?: string | undefined
  readonly debug: boolean
}

export interface CliDeps {
  readonly host?: ReportHost | undefined
  readonly env?: Env | undefined
  readonly createStore?: ((config: StoreConfig) => TableStore) | undefined
  readonly writeDebug?: ((line: string) => void) | undefined
}

export function createCLI(deps: CliDeps = {}): Command {
  const program = new Command()
  const env = deps.env ?? process.env
  const makeStore = deps.createStore ?? createStore
  const writeDebug = deps.writeDebug ?? ((line: string) => console.error(line))

  program
    .name('rowcount-assert')
    .version(VERSION)
    .description('Assert a comparison between table row counts')
    .argument('<expression>', 'comparison such as "orders > 0" or "a + b = c"')
    .option('-s, --severity <level>', 'note | warning | error | abend', 'error')
    .option('-m, --success-msg <text>', 'message emitted when the check passes')
    .option('-c, --commas <yes|no>', 'thousands separators in echoed counts', 'yes')
    .option('-e, --engine <engine>', `${ENGINES.join(' | ')} (env ROWCOUNT_ENGINE, default postgres)`)
    .option('-u, --url <url>', 'connection URL (env PG_URL, CH_URL or TRINO_URL)')
    .option('--database <name>', 'ClickHouse database for unqualified tables')
    .option('--schema <name>', 'PostgreSQL or Trino schema for unqualified tables')
    .option('--catalog <name>', 'Trino catalog')
    .option('--user <name>', 'Trino user')
    .option('--counts <list>', 'static row counts, e.g. "orders=12,work.items=3"')
    .option('--debug', 'print the per-phase debug log to stderr', false)
    .action(async (expression: string, options: CliOptions) => {
      const host = deps.host ?? createConsoleHost()

      let store: TableStore
      try {
        store = makeStore(resolveStoreConfig(options, env))
      } catch (err) {
        if (err instanceof ConfigError) {
          reportSetupFailure(host, err)
          return
        }
        throw err
      }

      const rowAssert = createRowAssert({ store, host })
      try {
        const outcome = await rowAssert.assert(expression, {
          severity: options.severity,
          successMessage: options.successMsg,
          commas: options.commas,
          debug: options.debug,
        })
        for (const entry of outcome.debug ?? []) {
          writeDebug(formatDebugEntry(entry))
        }
      } catch (err) {
        if (err instanceof StorageError || err instanceof ConfigError) {
          reportSetupFailure(host, err)
          return
        }
        throw err
      } finally {
        await rowAssert.close()
      }
    })

  return program
}

function reportSetupFailure(host: ReportHost, error: StorageError | ConfigError): void {
  host.emit('ERROR', error.message)
  if (error instanceof ConfigError) {
    for (const entry of error.errors) host.emit('ERROR', entry.message)
  } else if (error.cause instanceof Error) {
    host.emit('ERROR', error.cause.message)
  }
  host.raiseExitStatus(SETUP_FAILURE_STATUS)
}
