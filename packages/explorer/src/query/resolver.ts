import { NotFoundError, PaginationError } from '../errors'
import type {
  BlockId,
  Branch,
  BranchId,
  EpochNumber,
  PoolId,
  TransactionId,
  VotePlanId,
} from '../types'
import type { QueryContext } from './context'
import { TipSubscription, type TipSubscriptionOptions } from './subscription'
import {
  AddressView,
  BlockView,
  BranchView,
  EpochView,
  parseAddress,
  PoolView,
  TransactionView,
  VotePlanView,
} from './views'

export interface SettingsJson {
  fees: Record<string, string>
  epochStabilityDepth: number
}

/**
 * Root of the query surface. Entities that only make sense on one branch
 * (epochs, addresses, pools, vote plans) are resolved against the main
 * branch; the same entities on other branches are reached through
 * {@link BranchView}.
 */
export class ExplorerQuery {
  constructor(private readonly ctx: QueryContext) {}

  /** Same query bound to a consumer that may go away */
  withSignal(signal: AbortSignal): ExplorerQuery {
    return new ExplorerQuery({ ...this.ctx, signal })
  }

  block(id: BlockId): BlockView {
    return BlockView.byId(this.ctx, id.toLowerCase())
  }

  /** Every block at that chain length across branches; may be empty */
  blocksByChainLength(length: number): BlockView[] {
    if (!Number.isInteger(length) || length < 0) {
      throw new PaginationError('chain length must be a non-negative integer')
    }
    return this.ctx.dag
      .blocksAtChainLength(length)
      .map((record) => new BlockView(this.ctx, record))
  }

  transaction(id: TransactionId): TransactionView {
    return TransactionView.byId(this.ctx, id.toLowerCase())
  }

  /** Live branches, main first */
  branches(): BranchView[] {
    return this.ctx.tracker
      .liveBranches()
      .map((branch) => new BranchView(this.ctx, branch))
  }

  tip(): BranchView {
    return new BranchView(this.ctx, this.mainBranch())
  }

  /** Any branch, including retired ones */
  branch(id: BranchId): BranchView {
    return new BranchView(this.ctx, this.ctx.tracker.branchOrThrow(id))
  }

  epoch(id: EpochNumber): EpochView {
    return EpochView.onBranchOrThrow(this.ctx, id, this.mainBranch().id)
  }

  address(bech32: string): AddressView {
    return new AddressView(this.ctx, parseAddress(bech32), this.mainBranch().id)
  }

  stakePool(id: PoolId): PoolView {
    return PoolView.onBranchOrThrow(this.ctx, id, this.mainBranch().id)
  }

  votePlan(id: VotePlanId): VotePlanView {
    return VotePlanView.onBranchOrThrow(this.ctx, id, this.mainBranch().id)
  }

  settings(): SettingsJson {
    const { fees, epochStabilityDepth } = this.ctx.settings
    return {
      fees: Object.fromEntries(
        Object.entries(fees).map(([name, value]) => [name, value.toString()]),
      ),
      epochStabilityDepth,
    }
  }

  /** View of a branch handed out by the tip subscription */
  viewOf(branch: Branch): BranchView {
    return new BranchView(this.ctx, branch)
  }

  /**
   * Current main tip right away, then every new main tip
   */
  subscribeTip(opts: TipSubscriptionOptions = {}): TipSubscription {
    return new TipSubscription(this.ctx.tracker, opts)
  }

  private mainBranch(): Branch {
    const main = this.ctx.tracker.main
    if (main === undefined) throw new NotFoundError('branch', 'main')
    return main
  }
}
