import debugDefault from 'debug'
import {
  InternalConsistencyError,
  NotFoundError,
  OrphanBlockError,
} from '../errors'
import { toBlockRecord } from '../store/codec'
import type { AppliedBlock, BlockId, BlockRecord } from '../types'

const debug = debugDefault('explorer:dag')

interface DagNode {
  record: BlockRecord
  children: BlockId[]
}

/**
 * Arena of every linked block, indexed by id with explicit parent edges.
 * Nothing is ever removed: abandoned branches stay reachable by id.
 */
export class BlockDagIndex {
  private readonly arena = new Map<BlockId, DagNode>()
  private readonly byLength: BlockId[][] = []
  private genesisId: BlockId | undefined

  get size(): number {
    return this.arena.size
  }

  get genesis(): BlockRecord | undefined {
    return this.genesisId === undefined
      ? undefined
      : this.arena.get(this.genesisId)?.record
  }

  /** Greatest chain length of any linked block, -1 when empty */
  get maxChainLength(): number {
    return this.byLength.length - 1
  }

  has(id: BlockId): boolean {
    return this.arena.has(id)
  }

  get(id: BlockId): BlockRecord | undefined {
    return this.arena.get(id)?.record
  }

  getOrThrow(id: BlockId): BlockRecord {
    const node = this.arena.get(id)
    if (node === undefined) throw new NotFoundError('block', id)
    return node.record
  }

  children(id: BlockId): readonly BlockId[] {
    return this.arena.get(id)?.children ?? []
  }

  /**
   * Derive the record of a block without linking it.
   * Throws {@link OrphanBlockError} when the parent is not linked yet.
   */
  prepare(block: AppliedBlock): BlockRecord {
    if (block.parentId === null) {
      if (this.genesisId !== undefined && this.genesisId !== block.id) {
        throw new InternalConsistencyError(
          `second genesis block ${block.id}, genesis is ${this.genesisId}`,
        )
      }
      return toBlockRecord(block, 0)
    }
    const parent = this.arena.get(block.parentId)
    if (parent === undefined) {
      throw new OrphanBlockError(block.id, block.parentId)
    }
    return toBlockRecord(block, parent.record.chainLength + 1)
  }

  /**
   * Link a prepared record under its parent. Linking an id twice is a no-op.
   */
  link(record: BlockRecord): void {
    if (this.arena.has(record.id)) return

    if (record.parentId === null) {
      if (record.chainLength !== 0) {
        throw new InternalConsistencyError(
          `genesis ${record.id} has chain length ${record.chainLength}`,
        )
      }
      this.genesisId = record.id
    } else {
      const parent = this.arena.get(record.parentId)
      if (parent === undefined) {
        throw new OrphanBlockError(record.id, record.parentId)
      }
      if (record.chainLength !== parent.record.chainLength + 1) {
        throw new InternalConsistencyError(
          `block ${record.id} has chain length ${record.chainLength}, parent has ${parent.record.chainLength}`,
        )
      }
      parent.children.push(record.id)
    }

    this.arena.set(record.id, { record, children: [] })
    const atLength = this.byLength[record.chainLength]
    if (atLength) atLength.push(record.id)
    else this.byLength[record.chainLength] = [record.id]

    debug(`linked ${record.id.slice(0, 8)} at ${record.chainLength}`)
  }

  ingest(block: AppliedBlock): BlockRecord {
    const record = this.prepare(block)
    this.link(record)
    return this.getOrThrow(record.id)
  }

  /**
   * Lazily walks parent links from `id` (inclusive) back to genesis.
   * The returned iterable can be iterated any number of times.
   */
  ancestorChain(id: BlockId): Iterable<BlockRecord> {
    const start = this.getOrThrow(id)
    const arena = this.arena
    return {
      *[Symbol.iterator]() {
        let current: BlockRecord | undefined = start
        while (current !== undefined) {
          yield current
          current =
            current.parentId === null
              ? undefined
              : arena.get(current.parentId)?.record
        }
      },
    }
  }

  /**
   * Ancestor of `id` at `chainLength`, or undefined when `chainLength` is
   * above the block itself
   */
  ancestorAt(id: BlockId, chainLength: number): BlockRecord | undefined {
    for (const block of this.ancestorChain(id)) {
      if (block.chainLength === chainLength) return block
      if (block.chainLength < chainLength) return undefined
    }
    return undefined
  }

  blocksAtChainLength(chainLength: number): BlockRecord[] {
    const ids = this.byLength[chainLength] ?? []
    return ids.map((id) => this.getOrThrow(id))
  }
}
