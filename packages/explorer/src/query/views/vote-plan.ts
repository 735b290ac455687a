import { safeSyncTry } from '@chain-explorer/utils'
import {
  classifyError,
  ErrorCode,
  InternalConsistencyError,
  NotFoundError,
} from '../../errors'
import {
  type Connection,
  type FieldError,
  keyedSource,
  type PaginationArgs,
  resolveConnection,
} from '../../pagination'
import type { LedgerEvent, VotePlanState } from '../../store/entity-store'
import type {
  AddressId,
  BlockDate,
  BranchId,
  ProposalDeclaration,
  VotePlanDeclaration,
  VotePlanId,
} from '../../types'
import { onBranch, type QueryContext } from '../context'
import {
  type PayloadTypeJson,
  payloadTypeJson,
  unknownVariant,
  type VotePayloadJson,
  votePayloadJson,
} from '../variants'

export type TallyJson =
  | {
      __typename: 'TallyPublicStatus'
      results: string[]
      options: { start: number; end: number }
    }
  | {
      __typename: 'TallyPrivateStatus'
      /** null until the tally is decrypted */
      results: string[] | null
      options: { start: number; end: number }
    }

export interface VoteJson {
  address: AddressId
  payload: VotePayloadJson
}

export interface ProposalJson {
  proposalId: string
  index: number
  options: { start: number; end: number }
  tally: TallyJson | null
  tallyError?: FieldError
}

export interface VotePlanJson {
  id: VotePlanId
  voteStart: BlockDate
  voteEnd: BlockDate
  committeeEnd: BlockDate
  payloadType: PayloadTypeJson
  proposals: ProposalJson[]
}

export class VotePlanView {
  constructor(
    private readonly ctx: QueryContext,
    readonly state: VotePlanState,
    readonly declaration: VotePlanDeclaration,
    readonly branchId: BranchId,
  ) {}

  static onBranchOrThrow(
    ctx: QueryContext,
    id: VotePlanId,
    branchId: BranchId,
  ): VotePlanView {
    const state = ctx.store.getVotePlan(id)
    const declared = state?.declarations.find((e) =>
      onBranch(ctx, branchId, e.blockId),
    )
    if (state === undefined || declared === undefined) {
      throw new NotFoundError('vote plan', id)
    }
    return new VotePlanView(ctx, state, declared.certificate, branchId)
  }

  get id(): VotePlanId {
    return this.state.id
  }

  get context(): QueryContext {
    return this.ctx
  }

  isOnBranch(event: LedgerEvent): boolean {
    return onBranch(this.ctx, this.branchId, event.blockId)
  }

  proposals(): ProposalView[] {
    return this.declaration.proposals.map(
      (proposal, index) => new ProposalView(this, proposal, index),
    )
  }

  proposal(index: number): ProposalView {
    const proposal = this.declaration.proposals[index]
    if (proposal === undefined) {
      throw new NotFoundError('proposal', `${this.id}/${index}`)
    }
    return new ProposalView(this, proposal, index)
  }

  /** Newest tally certificate of the plan on the branch */
  latestTally() {
    const { tallies } = this.state
    for (let i = tallies.length - 1; i >= 0; i--) {
      if (this.isOnBranch(tallies[i])) return tallies[i].certificate
    }
    return undefined
  }

  toJSON(): VotePlanJson {
    const d = this.declaration
    return {
      id: this.id,
      voteStart: d.voteStart,
      voteEnd: d.voteEnd,
      committeeEnd: d.committeeEnd,
      payloadType: payloadTypeJson(d.payloadType),
      proposals: this.proposals().map((p) => p.toJSON()),
    }
  }
}

export class ProposalView {
  constructor(
    private readonly plan: VotePlanView,
    readonly proposal: ProposalDeclaration,
    readonly index: number,
  ) {}

  get width(): number {
    return this.proposal.options.end - this.proposal.options.start
  }

  private results(weights: readonly bigint[] | undefined): string[] {
    if (weights === undefined || weights.length !== this.width) {
      throw new InternalConsistencyError(
        `tally of ${this.plan.id}/${this.index} has ${weights?.length ?? 0} results for ${this.width} options`,
      )
    }
    return weights.map((w) => w.toString())
  }

  /**
   * Tally status by the payload type of the plan. Public plans report zero
   * weights until tallied, private plans report no results until the tally
   * is decrypted.
   */
  tally(): TallyJson {
    const options = {
      start: this.proposal.options.start,
      end: this.proposal.options.end,
    }
    const tally = this.plan.latestTally()
    const payloadType = this.plan.declaration.payloadType

    switch (payloadType) {
      case 'public': {
        if (tally?.kind === 'encryptedVoteTally') {
          throw new InternalConsistencyError(
            `encrypted tally for public vote plan ${this.plan.id}`,
            { code: ErrorCode.UNKNOWN_VARIANT },
          )
        }
        const results =
          tally === undefined
            ? new Array<string>(this.width).fill('0')
            : this.results(tally.results[this.index])
        return { __typename: 'TallyPublicStatus', results, options }
      }
      case 'private': {
        const results =
          tally?.kind === 'voteTally'
            ? this.results(tally.results[this.index])
            : null
        return { __typename: 'TallyPrivateStatus', results, options }
      }
      default:
        return unknownVariant(payloadType, 'TallyStatus')
    }
  }

  /** Votes cast for the proposal on the branch, in ingestion order */
  async votes(args: PaginationArgs): Promise<Connection<VoteJson>> {
    const payloadType = this.plan.declaration.payloadType
    const entries = this.plan.state.votes
      .filter((v) => v.proposalIndex === this.index && this.plan.isOnBranch(v))
      .map((v) => ({
        key: v.seq,
        value: (): VoteJson => ({
          address: v.address,
          payload: votePayloadJson(v.payload, payloadType),
        }),
      }))
    const ctx = this.plan.context
    return resolveConnection({
      kind: 'proposal-votes',
      scope: `${this.plan.id}/${this.index}`,
      source: keyedSource(entries),
      args,
      maxPageSize: ctx.maxPageSize,
      signal: ctx.signal,
    })
  }

  toJSON(): ProposalJson {
    const base = {
      proposalId: this.proposal.externalId,
      index: this.index,
      options: {
        start: this.proposal.options.start,
        end: this.proposal.options.end,
      },
    }
    const [err, tally] = safeSyncTry(() => this.tally())
    if (err !== undefined) {
      return { ...base, tally: null, tallyError: classifyError(err).toFieldError() }
    }
    return { ...base, tally }
  }
}
