export { BranchTracker } from './chain/branch-tracker'
export type { BranchTrackerEvent, BranchTrackerOptions } from './chain/branch-tracker'
export { BlockDagIndex } from './chain/dag-index'
export { BlockIngestor } from './chain/ingestor'
export type { IngestorEvent, IngestorOptions, SubmitResult } from './chain/ingestor'
export { LedgerIndex } from './chain/ledger-index'
export * from './config'
export { DbController } from './db/controller'
export type { DbOptions, KeyValueDatabase } from './db/controller'
export * from './errors'
export { Explorer } from './explorer'
export type { ExplorerInitOptions } from './explorer'
export { getLogger } from './logging'
export type { Logger, LogLevel } from './logging'
export { createMetrics } from './metrics'
export type { Metrics } from './metrics'
export * from './pagination'
export * from './query'
export * from './rpc'
export {
  decodeAppliedBlock,
  decodeStoredBlock,
  encodeAppliedBlock,
} from './store/codec'
export { EntityStore } from './store/entity-store'
export type * from './types'
