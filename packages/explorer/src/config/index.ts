export * as ConfigConstants from './constants'
export { configOptionsSchema } from './schema'
export type { ConfigOptions, RpcOptions } from './types'
export { createConfig, noTieBreak } from './utils'
export type { ResolvedConfig } from './utils'
