export type { QueryContext } from './context'
export { ExplorerQuery } from './resolver'
export type { SettingsJson } from './resolver'
export { TipSubscription } from './subscription'
export type { TipSubscriptionOptions, TipUpdate } from './subscription'
export {
  certificateJson,
  leaderJson,
  unknownVariant,
  votePayloadJson,
} from './variants'
export type {
  CertificateJson,
  LeaderJson,
  PayloadTypeJson,
  VotePayloadJson,
} from './variants'
export * from './views'
