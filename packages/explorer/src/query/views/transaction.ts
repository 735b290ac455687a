import { NotFoundError } from '../../errors'
import type { TransactionRecord } from '../../store/entity-store'
import type { AddressId, TransactionId } from '../../types'
import type { QueryContext } from '../context'
import { type CertificateJson, certificateJson } from '../variants'
import { BlockView } from './block'

export interface ValueJson {
  amount: string
  address: AddressId
}

export interface TransactionJson {
  id: TransactionId
  blocks: string[]
  inputs: ValueJson[]
  outputs: ValueJson[]
  certificate: CertificateJson | null
}

export class TransactionView {
  constructor(
    private readonly ctx: QueryContext,
    readonly record: TransactionRecord,
  ) {}

  static byId(ctx: QueryContext, id: TransactionId): TransactionView {
    const record = ctx.store.getTransaction(id)
    if (record === undefined) throw new NotFoundError('transaction', id)
    return new TransactionView(ctx, record)
  }

  get id(): TransactionId {
    return this.record.transaction.id
  }

  /** Every block carrying the transaction, across branches */
  blocks(): BlockView[] {
    return this.record.blockIds.map((id) => BlockView.byId(this.ctx, id))
  }

  certificate(): CertificateJson | null {
    const { certificate } = this.record.transaction
    return certificate === undefined ? null : certificateJson(certificate)
  }

  toJSON(): TransactionJson {
    const { transaction } = this.record
    return {
      id: transaction.id,
      blocks: [...this.record.blockIds],
      inputs: transaction.inputs.map((i) => ({
        amount: i.amount.toString(),
        address: i.address,
      })),
      outputs: transaction.outputs.map((o) => ({
        amount: o.amount.toString(),
        address: o.address,
      })),
      certificate: this.certificate(),
    }
  }
}
