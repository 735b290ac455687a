import type { ServerType } from '@hono/node-server'
import { serve } from '@hono/node-server'
import type { Context } from 'hono'
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { Logger } from '../../logging'
import { INTERNAL_ERROR, INVALID_REQUEST } from '../error-code'
import { getRpcErrorResponse, isLocalhostIP } from '../helpers'
import type { RpcApiEnv } from '../types'

export type RpcServerOpts = {
  port: number
  cors?: string
  address?: string
  bodyLimit?: number
  stacktraces?: boolean
  debug?: boolean
}

export type RpcServerModules = {
  logger: Logger
}

export class RpcServerBase {
  readonly app: Hono<RpcApiEnv>
  protected server?: ServerType
  protected readonly logger: Logger
  protected isListening = false

  constructor(
    protected opts: RpcServerOpts,
    modules: RpcServerModules,
  ) {
    const app = new Hono<RpcApiEnv>()
    this.logger = modules.logger

    app.use('*', cors({ origin: opts.cors ?? '*' }))
    app.onError((err, c) => this.onError(err, c))
    app.notFound((c) => this.onNotFound(c))
    this.app = app
  }

  get listening(): boolean {
    return this.isListening
  }

  async listen(): Promise<void> {
    if (this.isListening) return
    this.isListening = true
    return new Promise<void>((resolve, reject) => {
      try {
        const host = this.opts.address ?? '127.0.0.1'
        const server = serve(
          { fetch: this.app.fetch, port: this.opts.port, hostname: host },
          () => {
            this.server = server
            this.onListening(host)
            resolve()
          },
        )
      } catch (e) {
        this.logger.error('Error starting RPC server', { error: e })
        this.isListening = false
        reject(e)
      }
    })
  }

  async close(): Promise<void> {
    if (!this.isListening) return
    const server = this.server
    this.server = undefined
    this.isListening = false
    if (server === undefined) return

    await new Promise<void>((resolve, reject) => {
      server.close((e) => (e ? reject(e) : resolve()))
    })
    this.logger.debug('RPC server closed')
  }

  protected onError(err: Error, c: Context<RpcApiEnv>): Response {
    const requestId = c.get('requestId')
    const rpcMethod = c.get('rpcMethod')

    this.logger.error(`Req ${requestId} ${rpcMethod} error`, {
      reason: err.message,
    })

    const error = {
      code: INTERNAL_ERROR,
      message: err.message || 'Internal error',
      data: this.opts.stacktraces === true ? err.stack?.split('\n') : undefined,
    }

    return getRpcErrorResponse(c, error, 500)
  }

  private onNotFound(c: Context<RpcApiEnv>): Response {
    const message = `Route ${c.req.method}:${c.req.url} not found`
    this.logger.warn(message)
    return getRpcErrorResponse(c, { code: INVALID_REQUEST, message }, 404)
  }

  private onListening(host: string): void {
    if (!isLocalhostIP(host)) {
      this.logger.warn(
        'RPC server is exposed, ensure untrusted traffic cannot reach this API',
      )
    }
    const address = `http://${host}:${this.opts.port}`
    this.logger.info('Started RPC server', { address })
  }
}
