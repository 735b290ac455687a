import type { Logger, LogLevel } from '../logging'
import type { ChainScorer, FeeSettings } from '../types'

export interface RpcOptions {
  /**
   * Start the JSON-RPC server
   *
   * Default: `true`
   */
  enabled?: boolean
  /**
   * Default: `127.0.0.1`
   */
  address?: string
  /**
   * Default: `8546`
   */
  port?: number
  /**
   * Allowed CORS origin, `*` when unset
   */
  cors?: string
  /**
   * Maximum request body size in bytes
   */
  bodyLimit?: number
  /**
   * Include stack traces in error responses
   */
  stacktraces?: boolean
  debug?: boolean
}

export interface ConfigOptions {
  /**
   * Number of blocks on top of a block after which it is confirmed
   *
   * Default: `10`
   */
  epochStabilityDepth?: number

  /**
   * How far a branch tip may fall behind the main tip before the branch
   * is retired from the live set
   *
   * Default: same as `epochStabilityDepth`
   */
  retentionWindow?: number

  /**
   * Largest page any connection returns
   *
   * Default: `100`
   */
  maxPageSize?: number

  /**
   * Max blocks held while waiting for their parent
   *
   * Default: `1024`
   */
  orphanBufferLimit?: number

  /**
   * Directory of the durable block log. In-memory when unset.
   */
  datadir?: string

  /**
   * Default: `info`
   */
  logLevel?: LogLevel

  /**
   * A custom winston logger can be provided
   * if setting logging verbosity is not sufficient
   */
  logger?: Logger

  /**
   * Fee settings reported by the `settings` query. Accepts bigints,
   * integers or decimal strings.
   */
  fees?: Partial<Record<keyof FeeSettings, bigint | number | string>>

  rpc?: RpcOptions

  metrics?: { enabled?: boolean }

  /**
   * Ledger tie-break between branch tips of equal chain length
   */
  scorer?: ChainScorer
}
