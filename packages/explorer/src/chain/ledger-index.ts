import { assertNever } from '@chain-explorer/utils'
import debugDefault from 'debug'
import type { Logger } from '../logging'
import type {
  AddressState,
  EntityStore,
  PoolState,
  VotePlanState,
} from '../store/entity-store'
import type {
  AddressId,
  BlockRecord,
  PoolId,
  Transaction,
  VotePlanId,
} from '../types'

const debug = debugDefault('explorer:ledger')

export interface LedgerIndexOptions {
  store: EntityStore
  logger?: Logger
}

/**
 * Folds the certificates and value movements of every committed block into
 * the address, pool and vote plan aggregates of the entity store.
 *
 * Events are recorded for all branches alike; views decide which of them are
 * on the branch being queried.
 */
export class LedgerIndex {
  private readonly store: EntityStore
  private readonly logger?: Logger

  constructor(opts: LedgerIndexOptions) {
    this.store = opts.store
    this.logger = opts.logger
  }

  apply(record: BlockRecord): void {
    if (record.leader?.kind === 'stakePool') {
      this.pool(record.leader.poolId).producedBlocks.push({
        blockId: record.id,
        chainLength: record.chainLength,
      })
    }
    for (const tx of record.transactions) {
      this.applyTransaction(record, tx)
    }
  }

  private applyTransaction(record: BlockRecord, tx: Transaction): void {
    const involved = new Set<AddressId>()
    for (const input of tx.inputs) involved.add(input.address)
    for (const output of tx.outputs) involved.add(output.address)
    for (const address of involved) {
      this.address(address).transactions.push(this.event(record, tx))
    }

    const certificate = tx.certificate
    if (certificate === undefined) return

    switch (certificate.kind) {
      case 'stakeDelegation':
        this.address(certificate.account).delegations.push({
          ...this.event(record, tx),
          pools: certificate.pools,
        })
        break
      case 'ownerStakeDelegation': {
        const owner = tx.inputs[0]?.address
        if (owner === undefined) {
          this.logger?.warn(
            `Owner delegation in tx ${tx.id} has no input, skipped`,
          )
          break
        }
        this.address(owner).delegations.push({
          ...this.event(record, tx),
          pools: certificate.pools,
        })
        break
      }
      case 'poolRegistration':
        this.pool(certificate.poolId).registrations.push({
          ...this.event(record, tx),
          certificate,
        })
        break
      case 'poolRetirement':
        this.pool(certificate.poolId).retirements.push({
          ...this.event(record, tx),
          certificate,
        })
        break
      case 'poolUpdate':
        this.pool(certificate.poolId).updates.push({
          ...this.event(record, tx),
          certificate,
        })
        break
      case 'votePlan':
        this.votePlan(certificate.votePlanId).declarations.push({
          ...this.event(record, tx),
          certificate,
        })
        break
      case 'voteCast': {
        const voter = tx.inputs[0]?.address
        if (voter === undefined) {
          this.logger?.warn(`Vote in tx ${tx.id} has no input, skipped`)
          break
        }
        this.votePlan(certificate.votePlanId).votes.push({
          ...this.event(record, tx),
          proposalIndex: certificate.proposalIndex,
          address: voter,
          payload: certificate.payload,
        })
        break
      }
      case 'voteTally':
      case 'encryptedVoteTally':
        this.votePlan(certificate.votePlanId).tallies.push({
          ...this.event(record, tx),
          certificate,
        })
        break
      default:
        assertNever(certificate)
    }
    debug(`${certificate.kind} in ${tx.id.slice(0, 8)}`)
  }

  private event(record: BlockRecord, tx: Transaction) {
    return { seq: this.store.nextSeq(), blockId: record.id, txId: tx.id }
  }

  private address(id: AddressId): AddressState {
    let state = this.store.getAddress(id)
    if (state === undefined) {
      state = { id, transactions: [], delegations: [] }
      this.store.putAddress(state)
    }
    return state
  }

  private pool(id: PoolId): PoolState {
    let state = this.store.getPool(id)
    if (state === undefined) {
      state = {
        id,
        registrations: [],
        updates: [],
        retirements: [],
        producedBlocks: [],
      }
      this.store.putPool(state)
    }
    return state
  }

  private votePlan(id: VotePlanId): VotePlanState {
    let state = this.store.getVotePlan(id)
    if (state === undefined) {
      state = { id, declarations: [], votes: [], tallies: [] }
      this.store.putVotePlan(state)
    }
    return state
  }
}
