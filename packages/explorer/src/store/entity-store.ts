import type { DbController } from '../db/controller'
import type {
  AddressId,
  BlockId,
  BlockRecord,
  EncryptedVoteTally,
  EpochNumber,
  PoolId,
  PoolRegistration,
  PoolRetirement,
  PoolUpdate,
  Transaction,
  TransactionId,
  VotePayload,
  VotePlanDeclaration,
  VotePlanId,
  VoteTally,
} from '../types'
import { encodeAppliedBlock } from './codec'

/**
 * Position of an aggregate event: the global ingestion sequence number plus
 * the block and transaction that carried it. Aggregates keep every event of
 * every branch; branch views filter by block membership.
 */
export interface LedgerEvent {
  seq: number
  blockId: BlockId
  txId: TransactionId
}

export interface TransactionRecord {
  transaction: Transaction
  /** every block the transaction appeared in, in ingestion order */
  blockIds: BlockId[]
  /** index of the transaction inside each of those blocks */
  positions: Map<BlockId, number>
}

export interface PoolState {
  id: PoolId
  registrations: Array<LedgerEvent & { certificate: PoolRegistration }>
  updates: Array<LedgerEvent & { certificate: PoolUpdate }>
  retirements: Array<LedgerEvent & { certificate: PoolRetirement }>
  producedBlocks: Array<{ blockId: BlockId; chainLength: number }>
}

export interface VoteEvent extends LedgerEvent {
  proposalIndex: number
  address: AddressId
  payload: VotePayload
}

export interface VotePlanState {
  id: VotePlanId
  declarations: Array<LedgerEvent & { certificate: VotePlanDeclaration }>
  votes: VoteEvent[]
  tallies: Array<LedgerEvent & { certificate: VoteTally | EncryptedVoteTally }>
}

export interface AddressState {
  id: AddressId
  transactions: LedgerEvent[]
  /** an empty pool list removes the delegation */
  delegations: Array<LedgerEvent & { pools: PoolId[] }>
}

/**
 * Read model of every linked block and the records derived from it.
 *
 * Writes are split in two: `persistBlock` appends to the durable log and may
 * await, `commitBlock` publishes the block to readers synchronously so that a
 * reader never observes a block whose transactions are not yet linked.
 */
export class EntityStore {
  private readonly blocks = new Map<BlockId, BlockRecord>()
  private readonly transactions = new Map<TransactionId, TransactionRecord>()
  private readonly pools = new Map<PoolId, PoolState>()
  private readonly votePlans = new Map<VotePlanId, VotePlanState>()
  private readonly addresses = new Map<AddressId, AddressState>()
  private readonly epochs = new Map<EpochNumber, BlockId[]>()
  private seq = 0

  constructor(private readonly db: DbController) {}

  get blockCount(): number {
    return this.blocks.size
  }

  nextSeq(): number {
    return this.seq++
  }

  async persistBlock(record: BlockRecord): Promise<void> {
    await this.db.putBlock(record.id, encodeAppliedBlock(record))
  }

  /**
   * Publish a block and its transactions. Re-committing the same id is a no-op.
   */
  commitBlock(record: BlockRecord): void {
    if (this.blocks.has(record.id)) return
    this.blocks.set(record.id, record)

    const epochBlocks = this.epochs.get(record.date.epoch)
    if (epochBlocks) epochBlocks.push(record.id)
    else this.epochs.set(record.date.epoch, [record.id])

    record.transactions.forEach((tx, index) =>
      this.putTransaction(tx, record.id, index),
    )
  }

  hasBlock(id: BlockId): boolean {
    return this.blocks.has(id)
  }

  getBlock(id: BlockId): BlockRecord | undefined {
    return this.blocks.get(id)
  }

  /**
   * Every block of an epoch across all branches, in ingestion order
   */
  getEpochBlocks(epoch: EpochNumber): readonly BlockId[] {
    return this.epochs.get(epoch) ?? []
  }

  putTransaction(tx: Transaction, blockId: BlockId, index: number): void {
    const existing = this.transactions.get(tx.id)
    if (existing === undefined) {
      this.transactions.set(tx.id, {
        transaction: tx,
        blockIds: [blockId],
        positions: new Map([[blockId, index]]),
      })
      return
    }
    if (!existing.positions.has(blockId)) {
      existing.blockIds.push(blockId)
      existing.positions.set(blockId, index)
    }
  }

  getTransaction(id: TransactionId): TransactionRecord | undefined {
    return this.transactions.get(id)
  }

  putPool(pool: PoolState): void {
    this.pools.set(pool.id, pool)
  }

  getPool(id: PoolId): PoolState | undefined {
    return this.pools.get(id)
  }

  allPools(): IterableIterator<PoolState> {
    return this.pools.values()
  }

  putVotePlan(plan: VotePlanState): void {
    this.votePlans.set(plan.id, plan)
  }

  getVotePlan(id: VotePlanId): VotePlanState | undefined {
    return this.votePlans.get(id)
  }

  allVotePlans(): IterableIterator<VotePlanState> {
    return this.votePlans.values()
  }

  putAddress(address: AddressState): void {
    this.addresses.set(address.id, address)
  }

  getAddress(id: AddressId): AddressState | undefined {
    return this.addresses.get(id)
  }

  allAddresses(): IterableIterator<AddressState> {
    return this.addresses.values()
  }
}
