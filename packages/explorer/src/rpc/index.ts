export * from './error-code'
export { getRpcErrorResponse, getRpcResponse, toRpcErrorCode } from './helpers'
export { createRpcHandlers, ExplorerRpcMethods } from './modules'
export type { RpcMethods } from './modules'
export { RpcServerBase } from './server/base'
export type {
  RpcServerModules as RpcServerBaseModules,
  RpcServerOpts as RpcServerBaseOpts,
} from './server/base'
export { RpcServer } from './server/index'
export type {
  RpcServerModulesExtended as RpcServerModules,
  RpcServerOptsExtended as RpcServerOpts,
} from './server/index'
export type { RPCError, RpcApiEnv, RpcMethodFn } from './types'
export { createRpcHandler, createRpcMethod, rpcValidator } from './validation'
