import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { getLogger, type Logger } from '../logging'
import type { ChainScorer, FeeSettings } from '../types'
import { configOptionsSchema } from './schema'
import type { ConfigOptions } from './types'

/**
 * Ties are left to the previous main branch
 */
export const noTieBreak: ChainScorer = {
  compare: () => 0,
}

/**
 * Resolved config options with all defaults applied
 */
export interface ResolvedConfig {
  readonly epochStabilityDepth: number
  readonly retentionWindow: number
  readonly maxPageSize: number
  readonly orphanBufferLimit: number
  readonly datadir?: string
  readonly fees: Readonly<FeeSettings>
  readonly rpc: {
    readonly enabled: boolean
    readonly address: string
    readonly port: number
    readonly cors?: string
    readonly bodyLimit: number
    readonly stacktraces: boolean
    readonly debug: boolean
  }
  readonly metrics: { readonly enabled: boolean }
  readonly scorer: ChainScorer
  readonly logger: Logger
}

/**
 * Create config options from user-provided options, applying defaults
 */
export function createConfig(options: ConfigOptions = {}): ResolvedConfig {
  const { logger, scorer, ...rest } = options
  const parsed = configOptionsSchema.safeParse(rest)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigurationError(
      `Invalid config option ${issue.path.map(String).join('.')}: ${issue.message}`,
      { cause: parsed.error, metadata: { issues: z.treeifyError(parsed.error) } },
    )
  }
  const config = parsed.data

  return Object.freeze({
    epochStabilityDepth: config.epochStabilityDepth,
    retentionWindow: config.retentionWindow ?? config.epochStabilityDepth,
    maxPageSize: config.maxPageSize,
    orphanBufferLimit: config.orphanBufferLimit,
    datadir: config.datadir,
    fees: Object.freeze(config.fees),
    rpc: Object.freeze(config.rpc),
    metrics: Object.freeze(config.metrics),
    scorer: scorer ?? noTieBreak,
    logger: logger ?? getLogger({ logLevel: config.logLevel }),
  })
}
