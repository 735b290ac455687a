import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { ErrorCategory, ErrorCode, type ExplorerError } from '../errors'
import {
  INTERNAL_CONSISTENCY,
  INTERNAL_ERROR,
  INVALID_CURSOR,
  INVALID_PARAMS,
  QUERY_CANCELLED,
} from './error-code'
import type { RPCError, RpcApiEnv } from './types'

export const getRpcResponse = (
  c: Context<RpcApiEnv>,
  result: unknown,
  status?: ContentfulStatusCode,
) => {
  const jsonrpc = c.get('jsonrpc')
  const id = c.get('rpcId')
  return c.json({ jsonrpc, id, result }, status)
}

export const getRpcErrorResponse = (
  c: Context<RpcApiEnv>,
  error: RPCError,
  status?: ContentfulStatusCode,
) => {
  const jsonrpc = c.get('jsonrpc') ?? '2.0'
  const id = c.get('rpcId') ?? null
  return c.json({ jsonrpc, id, error }, status)
}

/**
 * JSON-RPC error code for an explorer error
 */
export const toRpcErrorCode = (error: ExplorerError): number => {
  switch (error.code) {
    case ErrorCode.INVALID_CURSOR:
      return INVALID_CURSOR
    case ErrorCode.QUERY_CANCELLED:
      return QUERY_CANCELLED
    case ErrorCode.INVALID_PAGINATION:
    case ErrorCode.INVALID_INPUT:
    case ErrorCode.DECODE_FAILED:
      return INVALID_PARAMS
    default:
      return error.category === ErrorCategory.CONSISTENCY
        ? INTERNAL_CONSISTENCY
        : INTERNAL_ERROR
  }
}

export const isLocalhostIP = (host: string): boolean =>
  host === 'localhost' || host === '::1' || host.startsWith('127.')
