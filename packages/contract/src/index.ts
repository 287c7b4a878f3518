// Contract test suites

export type { StoreContractConfig } from './storeContract.js'
export { describeTableStoreContract } from './storeContract.js'
