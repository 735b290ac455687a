import { BranchTracker } from './chain/branch-tracker'
import { BlockDagIndex } from './chain/dag-index'
import { BlockIngestor, type SubmitResult } from './chain/ingestor'
import { LedgerIndex } from './chain/ledger-index'
import { type ConfigOptions, createConfig, type ResolvedConfig } from './config'
import { DbController, type KeyValueDatabase } from './db/controller'
import type { Logger } from './logging'
import { createMetrics, type Metrics } from './metrics'
import { ExplorerQuery } from './query'
import { RpcServer } from './rpc'
import { EntityStore } from './store/entity-store'
import type { AppliedBlock } from './types'

export interface ExplorerInitOptions extends ConfigOptions {
  /** existing database to use as the block log instead of `datadir` */
  db?: KeyValueDatabase
}

export interface ExplorerModules {
  config: ResolvedConfig
  db: DbController
  store: EntityStore
  dag: BlockDagIndex
  tracker: BranchTracker
  ingestor: BlockIngestor
  metrics: Metrics
}

/**
 * The explorer index with its query surface and RPC server.
 *
 * `init` opens the block log and replays it; after that the index takes new
 * blocks through `submit` or `run`.
 */
export class Explorer {
  readonly config: ResolvedConfig
  readonly db: DbController
  readonly store: EntityStore
  readonly dag: BlockDagIndex
  readonly tracker: BranchTracker
  readonly ingestor: BlockIngestor
  readonly metrics: Metrics
  readonly query: ExplorerQuery
  readonly rpcServer?: RpcServer

  private closed = false

  static async init(options: ExplorerInitOptions = {}): Promise<Explorer> {
    const { db: database, ...configOptions } = options
    const config = createConfig(configOptions)
    const { logger } = config

    const db = await DbController.create(
      { datadir: config.datadir, db: database },
      { logger },
    )
    const store = new EntityStore(db)
    const dag = new BlockDagIndex()
    const tracker = new BranchTracker({
      dag,
      scorer: config.scorer,
      epochStabilityDepth: config.epochStabilityDepth,
      retentionWindow: config.retentionWindow,
    })
    const metrics = createMetrics({
      collectDefaultMetrics: config.metrics.enabled,
    })
    const ingestor = new BlockIngestor({
      db,
      store,
      dag,
      tracker,
      ledger: new LedgerIndex({ store, logger }),
      orphanBufferLimit: config.orphanBufferLimit,
      logger,
      metrics: metrics.index,
    })

    const explorer = new Explorer({
      config,
      db,
      store,
      dag,
      tracker,
      ingestor,
      metrics,
    })

    const restored = await ingestor.restore()
    if (restored > 0) {
      logger.info('Restored block index', {
        blocks: restored,
        branches: tracker.liveBranches().length,
        confirmedLength: tracker.confirmedLength,
      })
    }
    return explorer
  }

  protected constructor(modules: ExplorerModules) {
    this.config = modules.config
    this.db = modules.db
    this.store = modules.store
    this.dag = modules.dag
    this.tracker = modules.tracker
    this.ingestor = modules.ingestor
    this.metrics = modules.metrics

    this.query = new ExplorerQuery({
      store: this.store,
      dag: this.dag,
      tracker: this.tracker,
      settings: {
        fees: this.config.fees,
        epochStabilityDepth: this.config.epochStabilityDepth,
      },
      maxPageSize: this.config.maxPageSize,
    })

    if (this.config.rpc.enabled) {
      this.rpcServer = new RpcServer(
        { ...this.config.rpc, metricsEnabled: this.config.metrics.enabled },
        { logger: this.logger, query: this.query, metrics: this.metrics },
      )
    }

    this.watchTracker()
  }

  get logger(): Logger {
    return this.config.logger
  }

  submit(block: AppliedBlock): Promise<SubmitResult> {
    return this.ingestor.submit(block)
  }

  /** Index an applied block feed until it ends or `signal` aborts */
  run(feed: AsyncIterable<unknown>, signal?: AbortSignal): Promise<void> {
    return this.ingestor.run(feed, signal)
  }

  async listen(): Promise<void> {
    await this.rpcServer?.listen()
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.rpcServer?.close()
    await this.db.close()
    this.tracker.events.removeAllListeners()
    this.ingestor.events.removeAllListeners()
  }

  private watchTracker(): void {
    const { index } = this.metrics
    const { events } = this.tracker

    events.on('tip', (_branch, tip) => {
      index.mainChainLength.set(tip.chainLength)
    })
    events.on('mainSwitched', (branch, previous) => {
      index.mainSwitches.inc()
      this.logger.info('Main branch switched', {
        branch: branch.id,
        previous: previous.id,
        tip: branch.tipId,
      })
    })
    events.on('branchCreated', () => {
      index.liveBranches.set(this.tracker.liveBranches().length)
    })
    events.on('branchRetired', (branch) => {
      index.liveBranches.set(this.tracker.liveBranches().length)
      this.logger.debug('Branch retired', { branch: branch.id })
    })
    events.on('confirmed', () => {
      index.confirmedChainLength.set(this.tracker.confirmedLength)
    })
  }
}
