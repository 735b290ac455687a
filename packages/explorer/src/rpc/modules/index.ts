import type { RpcMetrics } from '../../metrics'
import type { ExplorerQuery } from '../../query'
import { createRpcHandler } from '../validation'
import { createExplorerRpcMethods } from './explorer'

export * from './explorer/index'
export { ExplorerRpcMethods } from './types'
export type { RpcMethods } from './types'

export const createRpcHandlers = (
  query: ExplorerQuery,
  debug: boolean,
  metrics?: RpcMetrics,
) => {
  const methods = createExplorerRpcMethods(query)
  return {
    rpcHandlers: createRpcHandler(methods, { debug }, metrics),
    methods: Object.keys(methods),
  }
}
