export { AddressView, parseAddress } from './address'
export type { AddressJson } from './address'
export { BlockView } from './block'
export type { BlockJson, TreasuryJson } from './block'
export { BranchView } from './branch'
export type { BranchJson } from './branch'
export { EpochView } from './epoch'
export type { EpochJson } from './epoch'
export { PoolView } from './pool'
export type { PoolJson } from './pool'
export { TransactionView } from './transaction'
export type { TransactionJson, ValueJson } from './transaction'
export { ProposalView, VotePlanView } from './vote-plan'
export type { ProposalJson, TallyJson, VoteJson, VotePlanJson } from './vote-plan'
