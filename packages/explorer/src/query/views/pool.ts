import { NotFoundError } from '../../errors'
import {
  type Connection,
  keyedSource,
  type PaginationArgs,
  resolveConnection,
} from '../../pagination'
import type { LedgerEvent, PoolState } from '../../store/entity-store'
import type { BranchId, PoolId } from '../../types'
import { onBranch, type QueryContext } from '../context'
import { type CertificateJson, certificateJson } from '../variants'
import { AddressView } from './address'
import { BlockView } from './block'

export interface PoolJson {
  id: PoolId
  registration: CertificateJson
  retirement: CertificateJson | null
  delegatedStake: string
  blockCount: number
}

export class PoolView {
  constructor(
    private readonly ctx: QueryContext,
    readonly state: PoolState,
    readonly branchId: BranchId,
  ) {}

  /**
   * Pool as registered on `branchId`; NotFound when it has no registration
   * there
   */
  static onBranchOrThrow(
    ctx: QueryContext,
    id: PoolId,
    branchId: BranchId,
  ): PoolView {
    const state = ctx.store.getPool(id)
    const registered = state?.registrations.some((e) =>
      onBranch(ctx, branchId, e.blockId),
    )
    if (state === undefined || registered !== true) {
      throw new NotFoundError('stake pool', id)
    }
    return new PoolView(ctx, state, branchId)
  }

  get id(): PoolId {
    return this.state.id
  }

  private latest<E extends LedgerEvent>(events: readonly E[]): E | undefined {
    for (let i = events.length - 1; i >= 0; i--) {
      if (onBranch(this.ctx, this.branchId, events[i].blockId)) return events[i]
    }
    return undefined
  }

  registration(): CertificateJson {
    const event = this.latest(this.state.registrations)
    if (event === undefined) throw new NotFoundError('stake pool', this.id)
    return certificateJson(event.certificate)
  }

  /** Latest retirement, unless the pool registered again afterwards */
  retirement(): CertificateJson | null {
    const retirement = this.latest(this.state.retirements)
    const registration = this.latest(this.state.registrations)
    if (retirement === undefined) return null
    if (registration !== undefined && registration.seq > retirement.seq) {
      return null
    }
    return certificateJson(retirement.certificate)
  }

  private producedOnBranch() {
    return this.state.producedBlocks
      .filter((b) => onBranch(this.ctx, this.branchId, b.blockId))
      .sort((a, b) => a.chainLength - b.chainLength)
  }

  async blocks(args: PaginationArgs): Promise<Connection<BlockView>> {
    return resolveConnection({
      kind: 'pool-blocks',
      scope: this.id,
      source: keyedSource(
        this.producedOnBranch().map((b) => ({
          key: b.chainLength,
          value: () => BlockView.byId(this.ctx, b.blockId),
        })),
      ),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  /** Sum of the balances of every address delegating to the pool */
  delegatedStake(): bigint {
    let stake = BigInt(0)
    for (const address of this.ctx.store.allAddresses()) {
      const view = new AddressView(this.ctx, address.id, this.branchId)
      if (view.delegation() !== this.id) continue
      const balance = view.balance()
      if (balance > BigInt(0)) stake += balance
    }
    return stake
  }

  toJSON(): PoolJson {
    return {
      id: this.id,
      registration: this.registration(),
      retirement: this.retirement(),
      delegatedStake: this.delegatedStake().toString(),
      blockCount: this.producedOnBranch().length,
    }
  }
}
