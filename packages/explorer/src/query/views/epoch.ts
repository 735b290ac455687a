import { NotFoundError } from '../../errors'
import {
  type Connection,
  keyedSource,
  type PaginationArgs,
  resolveConnection,
} from '../../pagination'
import type { BlockRecord, BranchId, EpochNumber } from '../../types'
import { onBranch, type QueryContext } from '../context'
import { BlockView } from './block'

export interface EpochJson {
  id: EpochNumber
  firstBlock: string
  lastBlock: string
  totalBlocks: number
}

/**
 * The blocks of one epoch on one branch
 */
export class EpochView {
  private constructor(
    private readonly ctx: QueryContext,
    readonly id: EpochNumber,
    readonly branchId: BranchId,
    private readonly records: readonly BlockRecord[],
  ) {}

  static onBranchOrThrow(
    ctx: QueryContext,
    epoch: EpochNumber,
    branchId: BranchId,
  ): EpochView {
    const records = ctx.store
      .getEpochBlocks(epoch)
      .filter((id) => onBranch(ctx, branchId, id))
      .map((id) => ctx.dag.getOrThrow(id))
      .sort((a, b) => a.chainLength - b.chainLength)
    if (records.length === 0) throw new NotFoundError('epoch', String(epoch))
    return new EpochView(ctx, epoch, branchId, records)
  }

  firstBlock(): BlockView {
    return new BlockView(this.ctx, this.records[0])
  }

  lastBlock(): BlockView {
    return new BlockView(this.ctx, this.records[this.records.length - 1])
  }

  get totalBlocks(): number {
    return this.records.length
  }

  async blocks(args: PaginationArgs): Promise<Connection<BlockView>> {
    return resolveConnection({
      kind: 'epoch-blocks',
      scope: String(this.id),
      source: keyedSource(
        this.records.map((record) => ({
          key: record.chainLength,
          value: () => new BlockView(this.ctx, record),
        })),
      ),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  toJSON(): EpochJson {
    return {
      id: this.id,
      firstBlock: this.firstBlock().id,
      lastBlock: this.lastBlock().id,
      totalBlocks: this.totalBlocks,
    }
  }
}
