import { safeError, safeTry } from '@chain-explorer/utils'
import type { Context, Next } from 'hono'
import type { z } from 'zod'
import { classifyError, ErrorCode, ValidationError } from '../errors'
import type { RpcMetrics } from '../metrics'
import { INVALID_PARAMS, METHOD_NOT_FOUND, PARSE_ERROR } from './error-code'
import {
  getRpcErrorResponse,
  getRpcResponse,
  toRpcErrorCode,
} from './helpers'
import type {
  RpcApiEnv,
  RpcHandler,
  RpcHandlerOptions,
  RpcMethodFn,
  RpcRequest,
} from './types'

export const rpcValidator =
  (schema: z.ZodType<RpcRequest>) =>
  async (c: Context<RpcApiEnv>, next: Next) => {
    const requestId = c.get('requestId')
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return getRpcErrorResponse(
        c,
        { code: PARSE_ERROR, message: 'Parse error' },
        400,
      )
    }
    const parsed = schema.safeParse(body)

    if (!parsed.success) {
      return c.json(
        {
          jsonrpc: '2.0',
          id: requestId,
          error: {
            code: INVALID_PARAMS,
            message: parsed.error.issues[0]?.message ?? 'Invalid request',
          },
        },
        400,
      )
    }
    const request = parsed.data
    c.set('jsonrpc', request.jsonrpc)
    c.set('rpcId', request.id ?? requestId)
    c.set('rpcMethod', request.method)
    c.set('rpcParams', request.params)

    return next()
  }

/**
 * Dispatch a validated request to its method. An entity that does not exist
 * resolves to `null`; other failures become JSON-RPC errors.
 */
export const createRpcHandler =
  (
    methods: Record<string, RpcMethodFn>,
    { debug = false }: RpcHandlerOptions = {},
    metrics?: RpcMetrics,
  ) =>
  async (c: Context<RpcApiEnv>) => {
    const rpcMethod = c.get('rpcMethod')
    const rpcParams = c.get('rpcParams')

    const handler = methods[rpcMethod]
    if (handler === undefined) {
      metrics?.requests.inc({ method: 'unknown', status: 'not_found' })
      return getRpcErrorResponse(
        c,
        { code: METHOD_NOT_FOUND, message: `Method ${rpcMethod} not found` },
        404,
      )
    }

    const stopTimer = metrics?.duration.startTimer({ method: rpcMethod })
    const [error, result] = await handler(c, rpcParams)
    stopTimer?.()

    if (error !== undefined) {
      const explorerError = classifyError(error)
      if (explorerError.code === ErrorCode.NOT_FOUND) {
        metrics?.requests.inc({ method: rpcMethod, status: 'ok' })
        return getRpcResponse(c, null)
      }
      metrics?.requests.inc({ method: rpcMethod, status: 'error' })
      return getRpcErrorResponse(
        c,
        {
          code: toRpcErrorCode(explorerError),
          message: explorerError.message,
          data: { code: explorerError.code },
          trace: debug ? explorerError.stack : undefined,
        },
        400,
      )
    }
    metrics?.requests.inc({ method: rpcMethod, status: 'ok' })
    return getRpcResponse(c, result)
  }

/**
 * Validate positional params with `schema` and run `impl`. Anything `impl`
 * throws becomes an error result.
 */
export const createRpcMethod =
  <T>(schema: z.ZodType<T>, impl: RpcHandler<T>): RpcMethodFn =>
  async (c, params) => {
    const parsed = schema.safeParse(params)

    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const path = issue?.path.length ? `${issue.path.map(String).join('.')}: ` : ''
      return safeError(
        new ValidationError(`${path}${issue?.message ?? 'Invalid params'}`, {
          cause: parsed.error,
        }),
      )
    }

    const [thrown, outcome] = await safeTry(() => impl(parsed.data, c))
    if (thrown !== undefined) return safeError(thrown)
    return outcome
  }
