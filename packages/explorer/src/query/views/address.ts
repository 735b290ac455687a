import { bech32 } from '@scure/base'
import { ValidationError } from '../../errors'
import {
  type Connection,
  keyedSource,
  type PaginationArgs,
  resolveConnection,
} from '../../pagination'
import type { AddressId, BranchId, PoolId } from '../../types'
import { onBranch, type QueryContext } from '../context'
import { TransactionView } from './transaction'

type Bech32String = `${string}1${string}`

const hasSeparator = (value: string): value is Bech32String =>
  value.includes('1')

/**
 * Normalize and check a bech32 address
 */
export function parseAddress(input: string): AddressId {
  const address = input.toLowerCase()
  if (!hasSeparator(address)) {
    throw new ValidationError(`Invalid address ${input}`)
  }
  try {
    bech32.decode(address, false)
  } catch (err) {
    throw new ValidationError(`Invalid address ${input}`, { cause: err })
  }
  return address
}

export interface AddressJson {
  id: AddressId
  delegation: PoolId | null
}

/**
 * An address as seen from one branch. Addresses are derived from the
 * transactions that mention them and always exist.
 */
export class AddressView {
  constructor(
    private readonly ctx: QueryContext,
    readonly id: AddressId,
    readonly branchId: BranchId,
  ) {}

  /** Pool the address currently delegates to on the branch */
  delegation(): PoolId | null {
    const state = this.ctx.store.getAddress(this.id)
    if (state === undefined) return null
    for (let i = state.delegations.length - 1; i >= 0; i--) {
      const event = state.delegations[i]
      if (onBranch(this.ctx, this.branchId, event.blockId)) {
        return event.pools[0] ?? null
      }
    }
    return null
  }

  /** Received minus spent value over the branch */
  balance(): bigint {
    const state = this.ctx.store.getAddress(this.id)
    if (state === undefined) return BigInt(0)
    let balance = BigInt(0)
    for (const event of state.transactions) {
      if (!onBranch(this.ctx, this.branchId, event.blockId)) continue
      const record = this.ctx.store.getTransaction(event.txId)
      if (record === undefined) continue
      for (const output of record.transaction.outputs) {
        if (output.address === this.id) balance += output.amount
      }
      for (const input of record.transaction.inputs) {
        if (input.address === this.id) balance -= input.amount
      }
    }
    return balance
  }

  async transactions(
    args: PaginationArgs,
  ): Promise<Connection<TransactionView>> {
    const events = this.ctx.store.getAddress(this.id)?.transactions ?? []
    const entries = events
      .filter((event) => onBranch(this.ctx, this.branchId, event.blockId))
      .map((event) => ({
        key: event.seq,
        value: () => TransactionView.byId(this.ctx, event.txId),
      }))
    return resolveConnection({
      kind: 'address-transactions',
      scope: this.id,
      source: keyedSource(entries),
      args,
      maxPageSize: this.ctx.maxPageSize,
      signal: this.ctx.signal,
    })
  }

  toJSON(): AddressJson {
    return { id: this.id, delegation: this.delegation() }
  }
}
