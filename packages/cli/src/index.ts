export type { CliDeps, CliOptions } from './cli.js'
export { createCLI, SETUP_FAILURE_STATUS, VERSION } from './cli.js'
export type { Engine, Env, StoreConfig, StoreFlags } from './config.js'
export { createStore, ENGINES, parseCounts, resolveStoreConfig } from './config.js'
