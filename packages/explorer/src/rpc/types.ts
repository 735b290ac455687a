import type { SafePromise } from '@chain-explorer/utils'
import type { Context } from 'hono'
import { z } from 'zod'

export type RPCError = {
  code: number
  message: string
  data?: unknown
  trace?: string
}

export type RpcApiEnv = {
  Variables: {
    requestId: string
    jsonrpc: string
    rpcParams: unknown[]
    rpcId: string | number | null
    rpcMethod: string
  }
}

export const rpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0', { error: 'Invalid JSON-RPC version' }),
  method: z.string({ error: 'Invalid method' }),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  params: z.array(z.unknown()).default([]),
})

export type RpcRequest = z.infer<typeof rpcRequestSchema>

export type RpcMethodFn = (
  c: Context<RpcApiEnv>,
  params: unknown[],
) => SafePromise<unknown>

export type RpcHandlerOptions = {
  debug?: boolean
}

export type RpcHandler<T> = (
  parsed: T,
  c: Context<RpcApiEnv>,
) => SafePromise<unknown>
