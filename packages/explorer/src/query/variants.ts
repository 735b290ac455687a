import { ErrorCode, InternalConsistencyError } from '../errors'
import type {
  BlockDate,
  Certificate,
  Leader,
  PayloadType,
  ProposalDeclaration,
  TaxType,
  VotePayload,
} from '../types'

/**
 * Every stored value decodes to exactly one variant; reaching this is a
 * fault in the index, not in the query.
 */
export function unknownVariant(value: never, union: string): never {
  throw new InternalConsistencyError(
    `No ${union} variant matches ${JSON.stringify(value)}`,
    { code: ErrorCode.UNKNOWN_VARIANT },
  )
}

export type PayloadTypeJson = 'PUBLIC' | 'PRIVATE'

export const payloadTypeJson = (type: PayloadType): PayloadTypeJson =>
  type === 'public' ? 'PUBLIC' : 'PRIVATE'

export type LeaderJson =
  | { __typename: 'Pool'; id: string }
  | { __typename: 'BftLeader'; id: string }

export function leaderJson(leader: Leader): LeaderJson {
  switch (leader.kind) {
    case 'stakePool':
      return { __typename: 'Pool', id: leader.poolId }
    case 'bftLeader':
      return { __typename: 'BftLeader', id: leader.publicKey }
    default:
      return unknownVariant(leader, 'Leader')
  }
}

export interface TaxTypeJson {
  fixed: string
  ratio: { numerator: string; denominator: string }
  maxLimit: string | null
}

export const taxTypeJson = (tax: TaxType): TaxTypeJson => ({
  fixed: tax.fixed.toString(),
  ratio: {
    numerator: tax.ratio.numerator.toString(),
    denominator: tax.ratio.denominator.toString(),
  },
  maxLimit: tax.maxLimit?.toString() ?? null,
})

export type VotePayloadJson =
  | { __typename: 'VotePayloadPublicStatus'; choice: number }
  | {
      __typename: 'VotePayloadPrivateStatus'
      encryptedVote: string
      proof: string
    }

/**
 * Dispatch a vote payload by the payload type of its plan
 */
export function votePayloadJson(
  payload: VotePayload,
  planType: PayloadType,
): VotePayloadJson {
  if (payload.kind !== planType) {
    throw new InternalConsistencyError(
      `${payload.kind} vote payload in a ${planType} vote plan`,
      { code: ErrorCode.UNKNOWN_VARIANT },
    )
  }
  switch (payload.kind) {
    case 'public':
      return { __typename: 'VotePayloadPublicStatus', choice: payload.choice }
    case 'private':
      return {
        __typename: 'VotePayloadPrivateStatus',
        encryptedVote: payload.encryptedVote,
        proof: payload.proof,
      }
    default:
      return unknownVariant(payload, 'VotePayloadStatus')
  }
}

interface ProposalJson {
  externalId: string
  options: { start: number; end: number }
}

const proposalJson = (p: ProposalDeclaration): ProposalJson => ({
  externalId: p.externalId,
  options: { start: p.options.start, end: p.options.end },
})

export type CertificateJson =
  | { __typename: 'StakeDelegation'; account: string; pools: string[] }
  | { __typename: 'OwnerStakeDelegation'; pools: string[] }
  | {
      __typename: 'PoolRegistration'
      pool: string
      startValidity: number
      managementThreshold: number
      owners: string[]
      operators: string[]
      rewards: TaxTypeJson
      rewardAccount: string | null
    }
  | { __typename: 'PoolRetirement'; poolId: string; retirementTime: number }
  | { __typename: 'PoolUpdate'; poolId: string; startValidity: number }
  | {
      __typename: 'VotePlanDeclaration'
      votePlan: string
      voteStart: BlockDate
      voteEnd: BlockDate
      committeeEnd: BlockDate
      payloadType: PayloadTypeJson
      proposals: ProposalJson[]
    }
  | {
      __typename: 'VoteCast'
      votePlan: string
      proposalIndex: number
      payload: VotePayloadJson
    }
  | { __typename: 'VoteTally'; votePlan: string; results: string[][] }
  | { __typename: 'EncryptedVoteTally'; votePlan: string }

/**
 * Resolve the certificate union of a transaction
 */
export function certificateJson(certificate: Certificate): CertificateJson {
  switch (certificate.kind) {
    case 'stakeDelegation':
      return {
        __typename: 'StakeDelegation',
        account: certificate.account,
        pools: certificate.pools,
      }
    case 'ownerStakeDelegation':
      return { __typename: 'OwnerStakeDelegation', pools: certificate.pools }
    case 'poolRegistration':
      return {
        __typename: 'PoolRegistration',
        pool: certificate.poolId,
        startValidity: certificate.startValidity,
        managementThreshold: certificate.managementThreshold,
        owners: certificate.owners,
        operators: certificate.operators,
        rewards: taxTypeJson(certificate.rewards),
        rewardAccount: certificate.rewardAccount ?? null,
      }
    case 'poolRetirement':
      return {
        __typename: 'PoolRetirement',
        poolId: certificate.poolId,
        retirementTime: certificate.retirementTime,
      }
    case 'poolUpdate':
      return {
        __typename: 'PoolUpdate',
        poolId: certificate.poolId,
        startValidity: certificate.startValidity,
      }
    case 'votePlan':
      return {
        __typename: 'VotePlanDeclaration',
        votePlan: certificate.votePlanId,
        voteStart: certificate.voteStart,
        voteEnd: certificate.voteEnd,
        committeeEnd: certificate.committeeEnd,
        payloadType: payloadTypeJson(certificate.payloadType),
        proposals: certificate.proposals.map(proposalJson),
      }
    case 'voteCast':
      return {
        __typename: 'VoteCast',
        votePlan: certificate.votePlanId,
        proposalIndex: certificate.proposalIndex,
        payload: votePayloadJson(certificate.payload, certificate.payload.kind),
      }
    case 'voteTally':
      return {
        __typename: 'VoteTally',
        votePlan: certificate.votePlanId,
        results: certificate.results.map((r) => r.map((w) => w.toString())),
      }
    case 'encryptedVoteTally':
      return {
        __typename: 'EncryptedVoteTally',
        votePlan: certificate.votePlanId,
      }
    default:
      return unknownVariant(certificate, 'Certificate')
  }
}
