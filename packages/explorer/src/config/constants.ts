import type { FeeSettings } from '../types'

export const EPOCH_STABILITY_DEPTH_DEFAULT = 10

export const MAX_PAGE_SIZE_DEFAULT = 100

export const ORPHAN_BUFFER_LIMIT_DEFAULT = 1024

export const LOG_LEVEL_DEFAULT = 'info'

export const RPC_ADDRESS_DEFAULT = '127.0.0.1'

export const RPC_PORT_DEFAULT = 8546

export const RPC_BODY_LIMIT_DEFAULT = 1024 * 1024

export const FEES_DEFAULT: FeeSettings = {
  constant: BigInt(0),
  coefficient: BigInt(0),
  certificate: BigInt(0),
  certificatePoolRegistration: BigInt(0),
  certificateStakeDelegation: BigInt(0),
  certificateOwnerStakeDelegation: BigInt(0),
  certificateVotePlan: BigInt(0),
  certificateVoteCast: BigInt(0),
}
