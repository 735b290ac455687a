import { InternalConsistencyError } from '../../errors'
import {
  type Connection,
  type KeyedEntry,
  keyedSource,
  type PaginationArgs,
  rangeSource,
  resolveConnection,
} from '../../pagination'
import type { AddressId, BlockId, Branch, BranchId } from '../../types'
import { onBranch, type QueryContext } from '../context'
import { AddressView } from './address'
import { BlockView } from './block'
import { PoolView } from './pool'
import type { TransactionView } from './transaction'
import { VotePlanView } from './vote-plan'

export interface BranchJson {
  id: BranchId
  tip: BlockId
  chainLength: string
  retired: boolean
}

export class BranchView {
  constructor(
    private readonly ctx: QueryContext,
    readonly branch: Branch,
  ) {}

  get id(): BranchId {
    return this.branch.id
  }

  /** Tip block */
  block(): BlockView {
    return BlockView.byId(this.ctx, this.branch.tipId)
  }

  /** Every block of the branch from genesis, keyed by chain length */
  async blocks(args: PaginationArgs): Promise<Connection<BlockView>> {
    const tip = this.block().record
    return resolveConnection({
      kind: 'branch-blocks',
      scope: this.branch.id,
      source: rangeSource(0, tip.chainLength, (chainLength) => {
        const id = this.ctx.tracker.ancestorIdAt(tip.id, chainLength)
        if (id === undefined) {
          throw new InternalConsistencyError(
            `branch ${this.branch.id} has no block at ${chainLength}`,
          )
        }
        return BlockView.byId(this.ctx, id)
      }),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  async transactionsByAddress(
    address: AddressId,
    args: PaginationArgs,
  ): Promise<Connection<TransactionView>> {
    return new AddressView(this.ctx, address, this.branch.id).transactions(args)
  }

  /** Pools registered on the branch, in registration order */
  async allStakePools(args: PaginationArgs): Promise<Connection<PoolView>> {
    const entries: KeyedEntry<PoolView>[] = []
    for (const state of this.ctx.store.allPools()) {
      const first = state.registrations.find((e) =>
        onBranch(this.ctx, this.branch.id, e.blockId),
      )
      if (first === undefined) continue
      entries.push({
        key: first.seq,
        value: () => PoolView.onBranchOrThrow(this.ctx, state.id, this.branch.id),
      })
    }
    entries.sort((a, b) => a.key - b.key)
    return resolveConnection({
      kind: 'stake-pools',
      scope: this.branch.id,
      source: keyedSource(entries),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  /** Vote plans declared on the branch, in declaration order */
  async allVotePlans(args: PaginationArgs): Promise<Connection<VotePlanView>> {
    const entries: KeyedEntry<VotePlanView>[] = []
    for (const state of this.ctx.store.allVotePlans()) {
      const first = state.declarations.find((e) =>
        onBranch(this.ctx, this.branch.id, e.blockId),
      )
      if (first === undefined) continue
      entries.push({
        key: first.seq,
        value: () =>
          VotePlanView.onBranchOrThrow(this.ctx, state.id, this.branch.id),
      })
    }
    entries.sort((a, b) => a.key - b.key)
    return resolveConnection({
      kind: 'vote-plans',
      scope: this.branch.id,
      source: keyedSource(entries),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  toJSON(): BranchJson {
    const tip = this.ctx.dag.get(this.branch.tipId)
    return {
      id: this.branch.id,
      tip: this.branch.tipId,
      chainLength: (tip?.chainLength ?? 0).toString(),
      retired: this.branch.retired,
    }
  }
}
