/**
 * Domain model of the indexed ledger.
 *
 * Records arrive already decoded from the ledger engine; every polymorphic
 * value carries a `kind` tag assigned once by the feed codec.
 */

/** Hex encoded content hash of a block */
export type BlockId = string
/** Hex encoded content hash of a transaction */
export type TransactionId = string
export type PoolId = string
export type VotePlanId = string
/** Bech32 encoded address, lowercase */
export type AddressId = string
/** Stable identifier of a branch: the id of the first block of that branch */
export type BranchId = string
export type EpochNumber = number

export interface BlockDate {
  epoch: number
  slot: number
}

export interface Ratio {
  numerator: bigint
  /** never zero */
  denominator: bigint
}

export interface TaxType {
  fixed: bigint
  ratio: Ratio
  maxLimit?: bigint
}

export interface Treasury {
  rewards: bigint
  treasury: bigint
  treasuryTax: TaxType
}

export type Leader =
  | { kind: 'stakePool'; poolId: PoolId }
  | { kind: 'bftLeader'; publicKey: string }

export interface TransactionInput {
  amount: bigint
  address: AddressId
}

export interface TransactionOutput {
  amount: bigint
  address: AddressId
}

export type PayloadType = 'public' | 'private'

export interface OptionRange {
  /** inclusive */
  start: number
  /** exclusive */
  end: number
}

export interface ProposalDeclaration {
  externalId: string
  options: OptionRange
}

export interface StakeDelegation {
  kind: 'stakeDelegation'
  account: AddressId
  pools: PoolId[]
}

export interface OwnerStakeDelegation {
  kind: 'ownerStakeDelegation'
  pools: PoolId[]
}

export interface PoolRegistration {
  kind: 'poolRegistration'
  poolId: PoolId
  startValidity: number
  managementThreshold: number
  owners: string[]
  operators: string[]
  rewards: TaxType
  rewardAccount?: AddressId
}

export interface PoolRetirement {
  kind: 'poolRetirement'
  poolId: PoolId
  retirementTime: number
}

export interface PoolUpdate {
  kind: 'poolUpdate'
  poolId: PoolId
  startValidity: number
}

export interface VotePlanDeclaration {
  kind: 'votePlan'
  votePlanId: VotePlanId
  voteStart: BlockDate
  voteEnd: BlockDate
  committeeEnd: BlockDate
  payloadType: PayloadType
  proposals: ProposalDeclaration[]
}

export type VotePayload =
  | { kind: 'public'; choice: number }
  | { kind: 'private'; encryptedVote: string; proof: string }

export interface VoteCast {
  kind: 'voteCast'
  votePlanId: VotePlanId
  proposalIndex: number
  payload: VotePayload
}

export interface VoteTally {
  kind: 'voteTally'
  votePlanId: VotePlanId
  /** Weight per option for every proposal, in proposal order */
  results: bigint[][]
}

export interface EncryptedVoteTally {
  kind: 'encryptedVoteTally'
  votePlanId: VotePlanId
}

export type Certificate =
  | StakeDelegation
  | OwnerStakeDelegation
  | PoolRegistration
  | PoolRetirement
  | PoolUpdate
  | VotePlanDeclaration
  | VoteCast
  | VoteTally
  | EncryptedVoteTally

export type CertificateKind = Certificate['kind']

export interface Transaction {
  id: TransactionId
  inputs: TransactionInput[]
  outputs: TransactionOutput[]
  certificate?: Certificate
}

/**
 * A block as delivered by the ledger engine
 */
export interface AppliedBlock {
  id: BlockId
  /** null only for the genesis block */
  parentId: BlockId | null
  date: BlockDate
  leader?: Leader
  treasury?: Treasury
  transactions: Transaction[]
}

/**
 * A block once linked into the index
 */
export interface BlockRecord extends AppliedBlock {
  chainLength: number
  totalInput: bigint
  totalOutput: bigint
}

export interface Branch {
  id: BranchId
  tipId: BlockId
  /** set once the branch fell out of the retention window */
  retired: boolean
}

export interface FeeSettings {
  constant: bigint
  coefficient: bigint
  certificate: bigint
  certificatePoolRegistration: bigint
  certificateStakeDelegation: bigint
  certificateOwnerStakeDelegation: bigint
  certificateVotePlan: bigint
  certificateVoteCast: bigint
}

export interface Settings {
  fees: FeeSettings
  epochStabilityDepth: number
}

/**
 * Ledger-supplied ordering used to break chain length ties between branch tips.
 * Must be a total order; 0 means the ledger cannot tell the tips apart.
 */
export interface ChainScorer {
  compare(a: BlockRecord, b: BlockRecord): number
}
