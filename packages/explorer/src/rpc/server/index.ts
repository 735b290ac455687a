import type { Context } from 'hono'
import { bodyLimit } from 'hono/body-limit'
import { requestId } from 'hono/request-id'
import { streamSSE } from 'hono/streaming'
import type { Metrics } from '../../metrics'
import type { ExplorerQuery } from '../../query'
import { INVALID_REQUEST } from '../error-code'
import { getRpcErrorResponse } from '../helpers'
import { createRpcHandlers } from '../modules'
import { type RpcApiEnv, rpcRequestSchema } from '../types'
import { rpcValidator } from '../validation'
import {
  RpcServerBase,
  type RpcServerModules,
  type RpcServerOpts,
} from './base'

export type RpcServerOptsExtended = RpcServerOpts & {
  /** serve prometheus metrics on `GET /metrics` */
  metricsEnabled?: boolean
}

export type RpcServerModulesExtended = RpcServerModules & {
  query: ExplorerQuery
  metrics?: Metrics
}

/**
 * JSON-RPC over `POST /`, main tip updates as server-sent events on
 * `GET /subscriptions/tip`.
 */
export class RpcServer extends RpcServerBase {
  readonly modules: RpcServerModulesExtended
  readonly methods: string[]

  constructor(opts: RpcServerOptsExtended, modules: RpcServerModulesExtended) {
    super(opts, modules)
    this.modules = modules

    const { rpcHandlers, methods } = createRpcHandlers(
      modules.query,
      opts.debug ?? false,
      modules.metrics?.rpc,
    )
    this.methods = methods

    this.app.use('*', requestId({ generator: () => Date.now().toString() }))
    if (opts.bodyLimit !== undefined) {
      this.app.use(
        '*',
        bodyLimit({
          maxSize: opts.bodyLimit,
          onError: (c: Context<RpcApiEnv>) =>
            getRpcErrorResponse(
              c,
              { code: INVALID_REQUEST, message: 'Request body too large' },
              413,
            ),
        }),
      )
    }

    this.app.post('/', rpcValidator(rpcRequestSchema), rpcHandlers)
    this.app.get('/subscriptions/tip', (c) => this.streamTip(c))

    const register = modules.metrics?.register
    if (opts.metricsEnabled === true && register !== undefined) {
      this.app.get('/metrics', async (c) =>
        c.text(await register.metrics(), 200, {
          'Content-Type': register.contentType,
        }),
      )
    }
  }

  private streamTip(c: Context<RpcApiEnv>) {
    const { query, metrics } = this.modules
    return streamSSE(c, async (stream) => {
      const subscription = query.subscribeTip({ signal: c.req.raw.signal })
      stream.onAbort(() => subscription.close())
      metrics?.rpc.tipSubscribers.inc()
      try {
        for await (const { branch, tip } of subscription) {
          await stream.writeSSE({
            event: 'tip',
            id: String(tip.chainLength),
            data: JSON.stringify({
              branch: query.viewOf(branch).toJSON(),
              block: query.block(tip.id).toJSON(),
            }),
          })
        }
      } finally {
        subscription.close()
        metrics?.rpc.tipSubscribers.dec()
      }
    })
  }
}
