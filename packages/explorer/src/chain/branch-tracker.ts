import debugDefault from 'debug'
import { EventEmitter } from 'eventemitter3'
import { ErrorCode, InternalConsistencyError, NotFoundError } from '../errors'
import type {
  BlockId,
  BlockRecord,
  Branch,
  BranchId,
  ChainScorer,
} from '../types'
import type { BlockDagIndex } from './dag-index'

const debug = debugDefault('explorer:branches')

export type BranchTrackerEvent = {
  /** the main branch got a new tip, by extension or by a switch */
  tip: (branch: Branch, tip: BlockRecord) => void
  /** a different branch became the main branch */
  mainSwitched: (branch: Branch, previous: Branch) => void
  branchCreated: (branch: Branch) => void
  branchRetired: (branch: Branch) => void
  /** newly confirmed blocks, oldest first */
  confirmed: (blockIds: BlockId[]) => void
}

export interface BranchTrackerOptions {
  dag: BlockDagIndex
  scorer: ChainScorer
  epochStabilityDepth: number
  retentionWindow: number
}

interface BranchState {
  id: BranchId
  tipId: BlockId
  retired: boolean
}

const snapshot = (state: BranchState): Branch => ({
  id: state.id,
  tipId: state.tipId,
  retired: state.retired,
})

/**
 * Tracks branch tips over the block DAG, selects the main branch and derives
 * which blocks are confirmed.
 *
 * The main chain is kept as an array indexed by chain length so that
 * membership of a block in the main chain is a single lookup; membership in any
 * other branch only walks the part of that branch that left the main chain.
 */
export class BranchTracker {
  readonly events = new EventEmitter<BranchTrackerEvent>()

  private readonly dag: BlockDagIndex
  private readonly scorer: ChainScorer
  private readonly depth: number
  private readonly retentionWindow: number

  private readonly branchesById = new Map<BranchId, BranchState>()
  /** live tip id -> branch */
  private readonly liveTips = new Map<BlockId, BranchState>()
  private readonly canonical: BlockId[] = []
  private readonly confirmedIds = new Set<BlockId>()
  private mainId: BranchId | undefined
  private stableLength = -1
  private stableTipId: BlockId | undefined

  constructor(opts: BranchTrackerOptions) {
    this.dag = opts.dag
    this.scorer = opts.scorer
    this.depth = opts.epochStabilityDepth
    this.retentionWindow = opts.retentionWindow
  }

  /** Chain length of the newest confirmed block, -1 before the first one */
  get confirmedLength(): number {
    return this.stableLength
  }

  get main(): Branch | undefined {
    const state = this.mainState()
    return state === undefined ? undefined : snapshot(state)
  }

  mainTip(): BlockRecord | undefined {
    const state = this.mainState()
    return state === undefined ? undefined : this.dag.get(state.tipId)
  }

  /** Live branches, main first, then by descending tip chain length */
  liveBranches(): Branch[] {
    const live = [...this.liveTips.values()].map(snapshot)
    const lengthOf = (b: Branch) => this.dag.get(b.tipId)?.chainLength ?? -1
    return live.sort((a, b) => {
      if (a.id === this.mainId) return -1
      if (b.id === this.mainId) return 1
      return lengthOf(b) - lengthOf(a) || (a.id < b.id ? -1 : 1)
    })
  }

  /** Any branch ever created, retired ones included */
  branch(id: BranchId): Branch | undefined {
    const state = this.branchesById.get(id)
    return state === undefined ? undefined : snapshot(state)
  }

  isConfirmed(blockId: BlockId): boolean {
    return this.confirmedIds.has(blockId)
  }

  /**
   * Id of the block at `chainLength` on the chain ending at `tipId`
   */
  ancestorIdAt(tipId: BlockId, chainLength: number): BlockId | undefined {
    let current = this.dag.get(tipId)
    if (current === undefined || chainLength < 0) return undefined
    if (chainLength > current.chainLength) return undefined
    while (
      current.chainLength > chainLength &&
      this.canonical[current.chainLength] !== current.id
    ) {
      if (current.parentId === null) return undefined
      const parent = this.dag.get(current.parentId)
      if (parent === undefined) return undefined
      current = parent
    }
    if (current.chainLength === chainLength) return current.id
    return this.canonical[chainLength]
  }

  isOnBranch(branchId: BranchId, blockId: BlockId): boolean {
    const branch = this.branchesById.get(branchId)
    const block = this.dag.get(blockId)
    if (branch === undefined || block === undefined) return false
    return this.ancestorIdAt(branch.tipId, block.chainLength) === block.id
  }

  /** Live branches whose chain contains the block */
  branchesOf(blockId: BlockId): Branch[] {
    return this.liveBranches().filter((b) => this.isOnBranch(b.id, blockId))
  }

  /**
   * Reject a block that would fork off below the confirmed point. Such a
   * block cannot be reconciled with already reported confirmations.
   */
  assertAboveConfirmed(record: BlockRecord): void {
    if (this.stableTipId === undefined) return
    if (record.chainLength <= this.stableLength || record.parentId === null) {
      throw new InternalConsistencyError(
        `block ${record.id} at ${record.chainLength} forks below confirmed length ${this.stableLength}`,
        { code: ErrorCode.DEEP_REORG, context: { blockId: record.id } },
      )
    }
    const ancestor = this.ancestorIdAt(record.parentId, this.stableLength)
    if (ancestor !== this.stableTipId) {
      throw new InternalConsistencyError(
        `block ${record.id} does not descend from confirmed block ${this.stableTipId}`,
        { code: ErrorCode.DEEP_REORG, context: { blockId: record.id } },
      )
    }
  }

  /**
   * Register a freshly linked block
   */
  onBlock(record: BlockRecord): void {
    const extended =
      record.parentId === null ? undefined : this.liveTips.get(record.parentId)

    let branch: BranchState
    if (extended !== undefined) {
      this.liveTips.delete(extended.tipId)
      extended.tipId = record.id
      branch = extended
    } else {
      branch = { id: record.id, tipId: record.id, retired: false }
      this.branchesById.set(branch.id, branch)
      debug(`branch ${branch.id.slice(0, 8)} created at ${record.chainLength}`)
      this.events.emit('branchCreated', snapshot(branch))
    }
    this.liveTips.set(record.id, branch)

    this.selectMain(branch)
    this.retireStale()
    this.confirm()
  }

  private mainState(): BranchState | undefined {
    return this.mainId === undefined
      ? undefined
      : this.branchesById.get(this.mainId)
  }

  private compareTips(a: BlockRecord, b: BlockRecord): number {
    return a.chainLength - b.chainLength || this.scorer.compare(a, b)
  }

  private selectMain(changed: BranchState): void {
    const current = this.mainState()
    const tip = this.dag.get(changed.tipId)
    if (tip === undefined) {
      throw new InternalConsistencyError(`tip ${changed.tipId} is not linked`)
    }

    if (current !== undefined && current.id !== changed.id) {
      const currentTip = this.dag.get(current.tipId)
      if (currentTip !== undefined && this.compareTips(tip, currentTip) <= 0) {
        return
      }
    }

    const previous = current
    this.mainId = changed.id
    this.rebuildCanonical(tip)

    if (previous !== undefined && previous.id !== changed.id) {
      debug(`main switched ${previous.id.slice(0, 8)} -> ${changed.id.slice(0, 8)}`)
      this.events.emit('mainSwitched', snapshot(changed), snapshot(previous))
    }
    this.events.emit('tip', snapshot(changed), tip)
  }

  private rebuildCanonical(tip: BlockRecord): void {
    this.canonical.length = tip.chainLength + 1
    for (const block of this.dag.ancestorChain(tip.id)) {
      if (this.canonical[block.chainLength] === block.id) break
      this.canonical[block.chainLength] = block.id
    }
  }

  private retireStale(): void {
    const mainTip = this.mainTip()
    if (mainTip === undefined) return
    for (const [tipId, branch] of [...this.liveTips]) {
      if (branch.id === this.mainId) continue
      const tip = this.dag.get(tipId)
      if (tip === undefined) continue
      if (mainTip.chainLength - tip.chainLength > this.retentionWindow) {
        branch.retired = true
        this.liveTips.delete(tipId)
        debug(`branch ${branch.id.slice(0, 8)} retired`)
        this.events.emit('branchRetired', snapshot(branch))
      }
    }
  }

  /**
   * Advance the confirmed point to the deepest block shared by every live
   * branch that is at least `depth` blocks below the shortest live tip.
   */
  private confirm(): void {
    const tips: BlockRecord[] = []
    for (const tipId of this.liveTips.keys()) {
      const tip = this.dag.get(tipId)
      if (tip !== undefined) tips.push(tip)
    }
    if (tips.length === 0) return

    const shortest = Math.min(...tips.map((t) => t.chainLength))
    let target = shortest - this.depth
    if (target <= this.stableLength) return

    // walk all tips down in lockstep until they meet
    while (target > this.stableLength) {
      const ids = new Set(tips.map((t) => this.ancestorIdAt(t.id, target)))
      const [only] = ids
      if (ids.size === 1 && only !== undefined) {
        this.advanceStable(only)
        return
      }
      target -= 1
    }
  }

  private advanceStable(tipId: BlockId): void {
    const newly: BlockId[] = []
    for (const block of this.dag.ancestorChain(tipId)) {
      if (block.chainLength <= this.stableLength) break
      this.confirmedIds.add(block.id)
      newly.push(block.id)
    }
    const tip = this.dag.getOrThrow(tipId)
    this.stableLength = tip.chainLength
    this.stableTipId = tipId
    newly.reverse()
    debug(`confirmed up to ${this.stableLength}`)
    this.events.emit('confirmed', newly)
  }

  /**
   * Throws {@link NotFoundError} for unknown branch ids
   */
  branchOrThrow(id: BranchId): Branch {
    const branch = this.branch(id)
    if (branch === undefined) throw new NotFoundError('branch', id)
    return branch
  }
}
