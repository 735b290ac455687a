import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import {
  encodeCursor,
  type Explorer,
  InvalidCursorError,
  NotFoundError,
  PaginationError,
  ValidationError,
} from '../../src'
import {
  address,
  blockId,
  createTestExplorer,
  makeBlock,
  makeTx,
  poolId,
  submitAll,
  txId,
} from './fixtures'

const A = address(1)
const B = address(2)
const C = address(3)
const P1 = poolId(1)

const tax = {
  fixed: BigInt(1),
  ratio: { numerator: BigInt(1), denominator: BigInt(10) },
}

/**
 * main: 0 - 1 - 2 - 3, fork: 1 - 4
 */
const ledger = [
  makeBlock(0, null, {
    leader: { kind: 'bftLeader', publicKey: 'leader-key' },
    treasury: { rewards: BigInt(10), treasury: BigInt(100), treasuryTax: tax },
    transactions: [
      makeTx(1, {
        outputs: [
          [A, BigInt(1000)],
          [B, BigInt(500)],
        ],
      }),
    ],
  }),
  makeBlock(1, 0, {
    leader: { kind: 'stakePool', poolId: P1 },
    transactions: [
      makeTx(2, {
        inputs: [[A, BigInt(10)]],
        certificate: {
          kind: 'poolRegistration',
          poolId: P1,
          startValidity: 0,
          managementThreshold: 1,
          owners: ['owner-key'],
          operators: [],
          rewards: tax,
        },
      }),
    ],
  }),
  makeBlock(2, 1, {
    date: { epoch: 1, slot: 0 },
    leader: { kind: 'stakePool', poolId: P1 },
    transactions: [
      makeTx(3, {
        inputs: [[A, BigInt(1)]],
        certificate: { kind: 'stakeDelegation', account: A, pools: [P1] },
      }),
    ],
  }),
  makeBlock(3, 2, {
    date: { epoch: 1, slot: 1 },
    transactions: [
      makeTx(4, {
        inputs: [[A, BigInt(100)]],
        outputs: [[C, BigInt(100)]],
      }),
    ],
  }),
  makeBlock(4, 1, {
    date: { epoch: 1, slot: 2 },
    transactions: [
      makeTx(5, {
        inputs: [[B, BigInt(50)]],
        outputs: [[C, BigInt(50)]],
      }),
    ],
  }),
]

describe('ExplorerQuery', () => {
  let explorer: Explorer

  beforeAll(async () => {
    explorer = await createTestExplorer({
      epochStabilityDepth: 2,
      fees: { constant: 2, coefficient: '3' },
    })
    await submitAll(explorer, ledger)
  })

  afterAll(async () => {
    await explorer.close()
  })

  describe('blocks', () => {
    it('should resolve block fields', () => {
      expect(explorer.query.block(blockId(0)).toJSON()).toEqual({
        id: blockId(0),
        date: { epoch: 0, slot: 0 },
        chainLength: '0',
        leader: { __typename: 'BftLeader', id: 'leader-key' },
        previousBlock: null,
        isConfirmed: true,
        totalInput: '0',
        totalOutput: '1500',
        treasury: {
          rewards: '10',
          treasury: '100',
          treasuryTax: {
            fixed: '1',
            ratio: { numerator: '1', denominator: '10' },
            maxLimit: null,
          },
        },
        transactionCount: 1,
      })
    })

    it('should resolve the leader union and confirmation', () => {
      const block = explorer.query.block(blockId(2))
      expect(block.leader()).toEqual({ __typename: 'Pool', id: P1 })
      expect(block.isConfirmed()).toBe(false)
      expect(block.previousBlock()?.id).toBe(blockId(1))
      expect(explorer.query.block(blockId(1)).isConfirmed()).toBe(true)
    })

    it('should list the live branches containing a block', () => {
      const ids = (n: number) =>
        explorer.query
          .block(blockId(n))
          .branches()
          .map((b) => b.id)
      expect(ids(1)).toEqual([blockId(0), blockId(4)])
      expect(ids(3)).toEqual([blockId(0)])
      expect(ids(4)).toEqual([blockId(4)])
    })

    it('should find blocks by chain length across branches', () => {
      const blocks = explorer.query.blocksByChainLength(2)
      expect(blocks.map((b) => b.id)).toEqual([blockId(2), blockId(4)])
      expect(explorer.query.blocksByChainLength(9)).toEqual([])
      expect(() => explorer.query.blocksByChainLength(-1)).toThrow(
        PaginationError,
      )
    })

    it('should page the transactions of a block', async () => {
      const connection = await explorer.query
        .block(blockId(3))
        .transactions({})
      expect(connection.edges.map((e) => e.node?.id)).toEqual([txId(4)])
      expect(connection.edges[0].cursor).toBe(
        encodeCursor({ kind: 'block-transactions', scope: blockId(3), key: 0 }),
      )
    })

    it('should throw NotFoundError for an unknown block', () => {
      expect(() => explorer.query.block(blockId(99))).toThrow(NotFoundError)
    })
  })

  describe('transactions', () => {
    it('should resolve a transaction with its certificate', () => {
      const tx = explorer.query.transaction(txId(2))
      expect(tx.blocks().map((b) => b.id)).toEqual([blockId(1)])
      expect(tx.toJSON()).toEqual({
        id: txId(2),
        blocks: [blockId(1)],
        inputs: [{ amount: '10', address: A }],
        outputs: [],
        certificate: {
          __typename: 'PoolRegistration',
          pool: P1,
          startValidity: 0,
          managementThreshold: 1,
          owners: ['owner-key'],
          operators: [],
          rewards: {
            fixed: '1',
            ratio: { numerator: '1', denominator: '10' },
            maxLimit: null,
          },
          rewardAccount: null,
        },
      })
      expect(explorer.query.transaction(txId(1)).certificate()).toBeNull()
    })
  })

  describe('branches', () => {
    it('should list live branches with main first', () => {
      expect(explorer.query.branches().map((b) => b.toJSON())).toEqual([
        {
          id: blockId(0),
          tip: blockId(3),
          chainLength: '3',
          retired: false,
        },
        {
          id: blockId(4),
          tip: blockId(4),
          chainLength: '2',
          retired: false,
        },
      ])
      expect(explorer.query.tip().block().id).toBe(blockId(3))
    })

    it('should page the blocks of a branch from genesis', async () => {
      const fork = await explorer.query.branch(blockId(4)).blocks({})
      expect(fork.edges.map((e) => e.node?.id)).toEqual([
        blockId(0),
        blockId(1),
        blockId(4),
      ])
      expect(fork.totalCount).toBe(3)

      const main = await explorer.query.tip().blocks({
        first: 2,
        after: encodeCursor({ kind: 'branch-blocks', scope: blockId(0), key: 0 }),
      })
      expect(main.edges.map((e) => e.node?.id)).toEqual([
        blockId(1),
        blockId(2),
      ])
      expect(main.pageInfo.hasPreviousPage).toBe(true)
      expect(main.pageInfo.hasNextPage).toBe(true)
      expect(main.totalCount).toBe(4)
    })

    it('should filter transactions by address per branch', async () => {
      const onMain = await explorer.query
        .tip()
        .transactionsByAddress(C, {})
      const onFork = await explorer.query
        .branch(blockId(4))
        .transactionsByAddress(C, {})
      expect(onMain.edges.map((e) => e.node?.id)).toEqual([txId(4)])
      expect(onFork.edges.map((e) => e.node?.id)).toEqual([txId(5)])
    })

    it('should reject an address cursor of another branch', async () => {
      const onFork = await explorer.query
        .branch(blockId(4))
        .transactionsByAddress(C, {})
      const after = onFork.pageInfo.endCursor ?? ''
      await expect(
        explorer.query.address(C).transactions({ after }),
      ).rejects.toThrow(InvalidCursorError)
    })

    it('should throw NotFoundError for an unknown branch', () => {
      expect(() => explorer.query.branch(blockId(2))).toThrow(NotFoundError)
    })
  })

  describe('epochs', () => {
    it('should resolve an epoch on the main branch', async () => {
      const epoch = explorer.query.epoch(1)
      expect(epoch.toJSON()).toEqual({
        id: 1,
        firstBlock: blockId(2),
        lastBlock: blockId(3),
        totalBlocks: 2,
      })
      const blocks = await epoch.blocks({ last: 1 })
      expect(blocks.edges.map((e) => e.node?.id)).toEqual([blockId(3)])
      expect(blocks.pageInfo.hasPreviousPage).toBe(true)
    })

    it('should throw NotFoundError for an epoch without blocks', () => {
      expect(() => explorer.query.epoch(5)).toThrow(NotFoundError)
    })
  })

  describe('addresses', () => {
    it('should resolve delegation and balance', () => {
      const view = explorer.query.address(A.toUpperCase())
      expect(view.toJSON()).toEqual({ id: A, delegation: P1 })
      expect(view.balance()).toBe(BigInt(889))
      expect(explorer.query.address(C).delegation()).toBeNull()
    })

    it('should page the transactions of an address', async () => {
      const connection = await explorer.query.address(A).transactions({})
      expect(connection.edges.map((e) => e.node?.id)).toEqual([
        txId(1),
        txId(2),
        txId(3),
        txId(4),
      ])
    })

    it('should reject a malformed address', () => {
      expect(() => explorer.query.address('not-an-address')).toThrow(
        ValidationError,
      )
      expect(() => explorer.query.address('addr1qqqq')).toThrow(
        ValidationError,
      )
    })
  })

  describe('stake pools', () => {
    it('should resolve a pool on the main branch', () => {
      expect(explorer.query.stakePool(P1).toJSON()).toMatchObject({
        id: P1,
        registration: { __typename: 'PoolRegistration', pool: P1 },
        retirement: null,
        delegatedStake: '889',
        blockCount: 2,
      })
    })

    it('should see the pool as the fork saw it', async () => {
      const pools = await explorer.query.branch(blockId(4)).allStakePools({})
      expect(pools.totalCount).toBe(1)
      expect(pools.edges[0].node?.toJSON()).toMatchObject({
        id: P1,
        delegatedStake: '0',
        blockCount: 1,
      })
    })

    it('should page the blocks a pool produced', async () => {
      const blocks = await explorer.query.stakePool(P1).blocks({})
      expect(blocks.edges.map((e) => e.node?.id)).toEqual([
        blockId(1),
        blockId(2),
      ])
      expect(blocks.edges[1].cursor).toBe(
        encodeCursor({ kind: 'pool-blocks', scope: P1, key: 2 }),
      )
    })

    it('should throw NotFoundError for an unregistered pool', () => {
      expect(() => explorer.query.stakePool(poolId(2))).toThrow(NotFoundError)
    })
  })

  it('should report settings', () => {
    expect(explorer.query.settings()).toEqual({
      fees: {
        constant: '2',
        coefficient: '3',
        certificate: '0',
        certificatePoolRegistration: '0',
        certificateStakeDelegation: '0',
        certificateOwnerStakeDelegation: '0',
        certificateVotePlan: '0',
        certificateVoteCast: '0',
      },
      epochStabilityDepth: 2,
    })
  })
})
