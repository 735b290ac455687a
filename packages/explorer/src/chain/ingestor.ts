import { Lock, safeTry } from '@chain-explorer/utils'
import debugDefault from 'debug'
import { EventEmitter } from 'eventemitter3'
import type { DbController } from '../db/controller'
import {
  DuplicateBlockError,
  ErrorCode,
  InternalConsistencyError,
  OrphanBlockError,
  QueryCancelledError,
} from '../errors'
import type { Logger } from '../logging'
import type { IndexMetrics } from '../metrics'
import {
  decodeAppliedBlock,
  decodeStoredBlock,
  sameBlockContent,
} from '../store/codec'
import type { EntityStore } from '../store/entity-store'
import type { AppliedBlock, BlockId, BlockRecord } from '../types'
import type { BranchTracker } from './branch-tracker'
import type { BlockDagIndex } from './dag-index'
import type { LedgerIndex } from './ledger-index'

const debug = debugDefault('explorer:ingest')

export type IngestorEvent = {
  block: (record: BlockRecord) => void
  orphan: (blockId: BlockId, missingParentId: BlockId) => void
  quarantine: (blockId: BlockId, error: InternalConsistencyError) => void
}

/**
 * - `linked`: the block (and any buffered descendants) joined the index
 * - `duplicate`: the same block was already linked
 * - `buffered`: the parent is missing, the block waits for it
 * - `quarantined`: the block can never be linked
 */
export type SubmitResult = 'linked' | 'duplicate' | 'buffered' | 'quarantined'

export interface IngestorOptions {
  db: DbController
  store: EntityStore
  dag: BlockDagIndex
  tracker: BranchTracker
  ledger: LedgerIndex
  orphanBufferLimit: number
  logger: Logger
  metrics?: IndexMetrics
}

/**
 * Single writer of the index. Blocks are applied one at a time; a block is
 * persisted first and then published to the store, DAG, ledger aggregates and
 * branch tracker without yielding, so readers see either all of it or none.
 */
export class BlockIngestor {
  readonly events = new EventEmitter<IngestorEvent>()

  private readonly db: DbController
  private readonly store: EntityStore
  private readonly dag: BlockDagIndex
  private readonly tracker: BranchTracker
  private readonly ledger: LedgerIndex
  private readonly orphanBufferLimit: number
  private readonly logger: Logger
  private readonly metrics?: IndexMetrics
  private readonly lock = new Lock()

  /** missing parent id -> waiting children */
  private readonly waiting = new Map<BlockId, AppliedBlock[]>()
  /** buffered block id -> block, in arrival order */
  private readonly orphans = new Map<BlockId, AppliedBlock>()
  private readonly quarantined = new Set<BlockId>()

  constructor(opts: IngestorOptions) {
    this.db = opts.db
    this.store = opts.store
    this.dag = opts.dag
    this.tracker = opts.tracker
    this.ledger = opts.ledger
    this.orphanBufferLimit = opts.orphanBufferLimit
    this.logger = opts.logger
    this.metrics = opts.metrics
  }

  get orphanCount(): number {
    return this.orphans.size
  }

  isQuarantined(id: BlockId): boolean {
    return this.quarantined.has(id)
  }

  /**
   * Apply one decoded block. Safe to call concurrently; calls are serialized.
   */
  async submit(block: AppliedBlock): Promise<SubmitResult> {
    return this.lock.runExclusive(() => this.apply(block, true))
  }

  /**
   * Consume an applied block feed until it ends or `signal` aborts. Each
   * element is decoded once; an element that fails to decode stops the run.
   */
  async run(feed: AsyncIterable<unknown>, signal?: AbortSignal): Promise<void> {
    for await (const raw of feed) {
      if (signal?.aborted === true) throw new QueryCancelledError()
      const block = decodeAppliedBlock(raw)
      await this.submit(block)
    }
  }

  /**
   * Rebuild the in-memory index from the durable block log
   */
  async restore(): Promise<number> {
    return this.lock.runExclusive(async () => {
      let restored = 0
      for await (const json of this.db.blocks()) {
        const result = await this.apply(decodeStoredBlock(json), false)
        if (result === 'linked') restored += 1
      }
      if (this.orphans.size > 0) {
        this.logger.warn('Block log holds blocks without parent', {
          count: this.orphans.size,
        })
      }
      return restored
    })
  }

  private async apply(
    block: AppliedBlock,
    persist: boolean,
  ): Promise<SubmitResult> {
    const existing = this.store.getBlock(block.id)
    if (existing !== undefined) {
      if (!sameBlockContent(existing, block)) {
        throw new DuplicateBlockError(block.id)
      }
      return 'duplicate'
    }

    const buffered = this.orphans.get(block.id)
    if (buffered !== undefined) {
      if (!sameBlockContent(buffered, block)) {
        throw new DuplicateBlockError(block.id)
      }
      // kept after a failed link while its parent was already indexed
      if (block.parentId === null || !this.dag.has(block.parentId)) {
        return 'buffered'
      }
      this.unbuffer(buffered)
    }

    if (this.quarantined.has(block.id)) return 'quarantined'
    if (block.parentId !== null && this.quarantined.has(block.parentId)) {
      this.quarantine(
        block,
        new InternalConsistencyError(
          `block ${block.id} descends from quarantined block ${block.parentId}`,
          { code: ErrorCode.DEEP_REORG, context: { blockId: block.id } },
        ),
      )
      return 'quarantined'
    }

    let record: BlockRecord
    try {
      record = this.dag.prepare(block)
      this.tracker.assertAboveConfirmed(record)
    } catch (err) {
      if (err instanceof OrphanBlockError) {
        this.buffer(block, err.missingParentId)
        return 'buffered'
      }
      if (err instanceof InternalConsistencyError) {
        this.quarantine(block, err)
        return 'quarantined'
      }
      throw err
    }

    if (persist) await this.store.persistBlock(record)
    this.publish(record)
    await this.drain(record.id, persist)
    return 'linked'
  }

  private publish(record: BlockRecord): void {
    this.store.commitBlock(record)
    this.dag.link(record)
    this.ledger.apply(record)
    this.tracker.onBlock(record)

    this.metrics?.blocksIngested.inc()
    debug(`block ${record.id.slice(0, 8)} at ${record.chainLength}`)
    this.events.emit('block', record)
  }

  private async drain(parentId: BlockId, persist: boolean): Promise<void> {
    const children = this.waiting.get(parentId)
    if (children === undefined) return
    this.waiting.delete(parentId)
    const failed: AppliedBlock[] = []
    for (const child of children) {
      this.orphans.delete(child.id)
      const [err] = await safeTry(() => this.apply(child, persist))
      if (err !== undefined) {
        this.logger.warn('Failed to link buffered block, keeping it', {
          blockId: child.id,
          error: err.message,
        })
        this.orphans.set(child.id, child)
        failed.push(child)
      }
    }
    if (failed.length > 0) this.waiting.set(parentId, failed)
    this.metrics?.orphansBuffered.set(this.orphans.size)
  }

  private buffer(block: AppliedBlock, missingParentId: BlockId): void {
    if (this.orphans.size >= this.orphanBufferLimit) this.evictOldest()

    this.orphans.set(block.id, block)
    const siblings = this.waiting.get(missingParentId)
    if (siblings) siblings.push(block)
    else this.waiting.set(missingParentId, [block])

    this.metrics?.orphansBuffered.set(this.orphans.size)
    debug(`orphan ${block.id.slice(0, 8)} waits for ${missingParentId.slice(0, 8)}`)
    this.events.emit('orphan', block.id, missingParentId)
  }

  private evictOldest(): void {
    const [oldest] = this.orphans.values()
    if (oldest === undefined || oldest.parentId === null) return
    this.unbuffer(oldest)
    this.logger.warn('Orphan buffer full, dropped oldest block', {
      blockId: oldest.id,
      missingParentId: oldest.parentId,
    })
  }

  private unbuffer(block: AppliedBlock): void {
    this.orphans.delete(block.id)
    this.metrics?.orphansBuffered.set(this.orphans.size)
    if (block.parentId === null) return
    const siblings = this.waiting.get(block.parentId)
    const remaining = siblings?.filter((b) => b.id !== block.id) ?? []
    if (remaining.length > 0) this.waiting.set(block.parentId, remaining)
    else this.waiting.delete(block.parentId)
  }

  /**
   * Reject a block and every buffered descendant of it
   */
  private quarantine(block: AppliedBlock, error: InternalConsistencyError): void {
    const pending: AppliedBlock[] = [block]
    for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
      this.quarantined.add(next.id)
      this.orphans.delete(next.id)
      this.metrics?.quarantinedBlocks.inc()
      this.events.emit('quarantine', next.id, error)
      const children = this.waiting.get(next.id)
      if (children !== undefined) {
        this.waiting.delete(next.id)
        pending.push(...children)
      }
    }
    this.metrics?.orphansBuffered.set(this.orphans.size)
    this.logger.error(`Quarantined block ${block.id}: ${error.message}`)
  }
}
