import { beforeEach, describe, expect, it } from 'vitest'
import { BranchTracker } from '../../src/chain/branch-tracker'
import { BlockDagIndex } from '../../src/chain/dag-index'
import { noTieBreak } from '../../src/config'
import { ErrorCode, InternalConsistencyError } from '../../src/errors'
import type { AppliedBlock, BlockId, ChainScorer } from '../../src/types'
import { blockId, catchError, linearChain, makeBlock } from './fixtures'

const byId: ChainScorer = {
  compare: (a, b) => (a.id > b.id ? 1 : a.id < b.id ? -1 : 0),
}

describe('BranchTracker', () => {
  let dag: BlockDagIndex
  let tracker: BranchTracker

  const setup = (scorer: ChainScorer = noTieBreak) => {
    dag = new BlockDagIndex()
    tracker = new BranchTracker({
      dag,
      scorer,
      epochStabilityDepth: 2,
      retentionWindow: 2,
    })
  }

  const add = (block: AppliedBlock) => {
    const record = dag.prepare(block)
    tracker.assertAboveConfirmed(record)
    dag.link(record)
    tracker.onBlock(record)
    return record
  }

  beforeEach(() => setup())

  it('should extend a single branch named after its first block', () => {
    linearChain(0, 4).forEach(add)

    expect(tracker.main).toEqual({
      id: blockId(0),
      tipId: blockId(4),
      retired: false,
    })
    expect(tracker.liveBranches()).toHaveLength(1)
  })

  it('should confirm blocks buried under the stability depth', () => {
    const confirmed: BlockId[][] = []
    tracker.events.on('confirmed', (ids) => confirmed.push(ids))

    linearChain(0, 4).forEach(add)

    expect(confirmed).toEqual([[blockId(0)], [blockId(1)], [blockId(2)]])
    expect(tracker.confirmedLength).toBe(2)
    expect(tracker.isConfirmed(blockId(2))).toBe(true)
    expect(tracker.isConfirmed(blockId(3))).toBe(false)
  })

  describe('fork', () => {
    beforeEach(() => {
      linearChain(0, 2).forEach(add)
      add(makeBlock(3, 1))
    })

    it('should open a new branch for a block off a non-tip parent', () => {
      expect(tracker.liveBranches().map((b) => b.id)).toEqual([
        blockId(0),
        blockId(3),
      ])
      expect(tracker.main?.id).toBe(blockId(0))
    })

    it('should answer branch membership', () => {
      expect(tracker.ancestorIdAt(blockId(3), 1)).toBe(blockId(1))
      expect(tracker.ancestorIdAt(blockId(3), 2)).toBe(blockId(3))
      expect(tracker.isOnBranch(blockId(3), blockId(2))).toBe(false)
      expect(tracker.isOnBranch(blockId(0), blockId(3))).toBe(false)
      expect(tracker.branchesOf(blockId(1)).map((b) => b.id)).toEqual([
        blockId(0),
        blockId(3),
      ])
      expect(tracker.branchesOf(blockId(3)).map((b) => b.id)).toEqual([
        blockId(3),
      ])
    })

    it('should switch main only to a strictly longer branch', () => {
      const switches: Array<[string, string]> = []
      tracker.events.on('mainSwitched', (branch, previous) =>
        switches.push([branch.id, previous.id]),
      )

      add(makeBlock(4, 3))

      expect(switches).toEqual([[blockId(3), blockId(0)]])
      expect(tracker.main).toEqual({
        id: blockId(3),
        tipId: blockId(4),
        retired: false,
      })
      expect(tracker.mainTip()?.id).toBe(blockId(4))
      expect(tracker.isOnBranch(blockId(3), blockId(1))).toBe(true)
      expect(tracker.isOnBranch(blockId(3), blockId(2))).toBe(false)
    })

    it('should retire a branch left behind and confirm past the fork', () => {
      const retired: string[] = []
      const confirmed: BlockId[][] = []
      tracker.events.on('branchRetired', (b) => retired.push(b.id))
      tracker.events.on('confirmed', (ids) => confirmed.push(ids))

      add(makeBlock(4, 3))
      add(makeBlock(5, 4))
      expect(retired).toEqual([])

      add(makeBlock(6, 5))

      expect(retired).toEqual([blockId(0)])
      expect(tracker.branch(blockId(0))?.retired).toBe(true)
      expect(tracker.liveBranches().map((b) => b.id)).toEqual([blockId(3)])
      expect(confirmed).toEqual([[blockId(1), blockId(3), blockId(4)]])
      expect(tracker.confirmedLength).toBe(3)
      expect(tracker.isConfirmed(blockId(2))).toBe(false)
    })

    it('should refuse blocks forking below the confirmed point', () => {
      add(makeBlock(4, 3))
      add(makeBlock(5, 4))
      add(makeBlock(6, 5))

      const deep = dag.prepare(makeBlock(7, 2))
      const err = catchError(() => tracker.assertAboveConfirmed(deep))
      expect(err).toBeInstanceOf(InternalConsistencyError)
      expect(err).toMatchObject({ code: ErrorCode.DEEP_REORG })

      const shallow = dag.prepare(makeBlock(8, 4))
      expect(() => tracker.assertAboveConfirmed(shallow)).not.toThrow()
    })
  })

  it('should leave equal length ties to the current main without a scorer', () => {
    add(makeBlock(0, null))
    add(makeBlock(1, 0))
    add(makeBlock(2, 0))

    expect(tracker.main?.id).toBe(blockId(0))
  })

  it('should break equal length ties with the scorer', () => {
    setup(byId)
    add(makeBlock(0, null))
    add(makeBlock(1, 0))
    add(makeBlock(2, 0))

    expect(tracker.main).toEqual({
      id: blockId(2),
      tipId: blockId(2),
      retired: false,
    })
  })

  it('should emit the main tip on every change', () => {
    const tips: string[] = []
    tracker.events.on('tip', (_branch, tip) => tips.push(tip.id))

    linearChain(0, 1).forEach(add)
    add(makeBlock(2, 0))

    expect(tips).toEqual([blockId(0), blockId(1)])
  })
})
