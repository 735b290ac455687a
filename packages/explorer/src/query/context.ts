import type { BranchTracker } from '../chain/branch-tracker'
import type { BlockDagIndex } from '../chain/dag-index'
import type { EntityStore } from '../store/entity-store'
import type { BlockId, BranchId, Settings } from '../types'

/**
 * Everything a view needs to resolve its fields. Views hold no state of
 * their own; they read the shared index on every field access.
 */
export interface QueryContext {
  readonly store: EntityStore
  readonly dag: BlockDagIndex
  readonly tracker: BranchTracker
  readonly settings: Settings
  readonly maxPageSize: number
  /** aborted when the consumer goes away */
  readonly signal?: AbortSignal
}

export const onBranch = (
  ctx: QueryContext,
  branchId: BranchId,
  blockId: BlockId,
): boolean => ctx.tracker.isOnBranch(branchId, blockId)
