import { NotFoundError } from '../../errors'
import {
  type Connection,
  type PaginationArgs,
  rangeSource,
  resolveConnection,
} from '../../pagination'
import type { BlockDate, BlockId, BlockRecord, Treasury } from '../../types'
import type { QueryContext } from '../context'
import {
  type LeaderJson,
  leaderJson,
  type TaxTypeJson,
  taxTypeJson,
} from '../variants'
import { BranchView } from './branch'
import { TransactionView } from './transaction'

export interface TreasuryJson {
  rewards: string
  treasury: string
  treasuryTax: TaxTypeJson
}

export interface BlockJson {
  id: BlockId
  date: BlockDate
  chainLength: string
  leader: LeaderJson | null
  previousBlock: BlockId | null
  isConfirmed: boolean
  totalInput: string
  totalOutput: string
  treasury: TreasuryJson | null
  transactionCount: number
}

const treasuryJson = (treasury: Treasury): TreasuryJson => ({
  rewards: treasury.rewards.toString(),
  treasury: treasury.treasury.toString(),
  treasuryTax: taxTypeJson(treasury.treasuryTax),
})

export class BlockView {
  constructor(
    private readonly ctx: QueryContext,
    readonly record: BlockRecord,
  ) {}

  static byId(ctx: QueryContext, id: BlockId): BlockView {
    const record = ctx.store.getBlock(id)
    if (record === undefined) throw new NotFoundError('block', id)
    return new BlockView(ctx, record)
  }

  get id(): BlockId {
    return this.record.id
  }

  previousBlock(): BlockView | null {
    const { parentId } = this.record
    return parentId === null ? null : BlockView.byId(this.ctx, parentId)
  }

  leader(): LeaderJson | null {
    return this.record.leader === undefined
      ? null
      : leaderJson(this.record.leader)
  }

  isConfirmed(): boolean {
    return this.ctx.tracker.isConfirmed(this.record.id)
  }

  /** Live branches containing this block */
  branches(): BranchView[] {
    return this.ctx.tracker
      .branchesOf(this.record.id)
      .map((branch) => new BranchView(this.ctx, branch))
  }

  async transactions(
    args: PaginationArgs,
  ): Promise<Connection<TransactionView>> {
    const { transactions } = this.record
    return resolveConnection({
      kind: 'block-transactions',
      scope: this.record.id,
      source: rangeSource(0, transactions.length - 1, (index) =>
        TransactionView.byId(this.ctx, transactions[index].id),
      ),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  toJSON(): BlockJson {
    const r = this.record
    return {
      id: r.id,
      date: { epoch: r.date.epoch, slot: r.date.slot },
      chainLength: r.chainLength.toString(),
      leader: this.leader(),
      previousBlock: r.parentId,
      isConfirmed: this.isConfirmed(),
      totalInput: r.totalInput.toString(),
      totalOutput: r.totalOutput.toString(),
      treasury: r.treasury === undefined ? null : treasuryJson(r.treasury),
      transactionCount: r.transactions.length,
    }
  }
}
