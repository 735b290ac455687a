import { Level } from 'level'
import { MemoryLevel } from 'memory-level'
import { StorageError } from '../errors'
import type { Logger } from '../logging'

/**
 * The part of an abstract-level database the block log relies on
 */
export interface KeyValueDatabase {
  open(): Promise<void>
  close(): Promise<void>
  put(key: string, value: string): Promise<void>
  iterator(): AsyncIterable<[string, string]>
}

export interface DbOptions {
  /** Database path. In-memory when unset. */
  datadir?: string
  /** Optional existing DB instance */
  db?: KeyValueDatabase
}

export interface DbModules {
  logger: Logger
}

enum Status {
  started = 'started',
  closed = 'closed',
}

const BLOCK_PREFIX = 'block:'

/**
 * Database controller wrapping a Level database as the durable block log.
 *
 * Block keys embed a zero-padded arrival ordinal so that iteration replays
 * blocks in the order they were linked, every parent before its children.
 */
export class DbController {
  private status = Status.started
  private nextOrdinal = 0

  private constructor(
    private readonly logger: Logger,
    private readonly db: KeyValueDatabase,
  ) {}

  /**
   * Create a new DB controller instance
   */
  static async create(
    opts: DbOptions,
    modules: DbModules,
  ): Promise<DbController> {
    let db: KeyValueDatabase
    if (opts.db) {
      db = opts.db
    } else if (opts.datadir !== undefined) {
      db = new Level<string, string>(opts.datadir, { valueEncoding: 'utf8' })
    } else {
      db = new MemoryLevel<string, string>({ valueEncoding: 'utf8' })
    }

    try {
      await db.open()
    } catch (e) {
      const cause = e instanceof Error ? e.cause : undefined
      if (
        typeof cause === 'object' &&
        cause !== null &&
        'code' in cause &&
        cause.code === 'LEVEL_LOCKED'
      ) {
        throw new StorageError('Database already in use by another process', {
          cause: e,
        })
      }
      throw new StorageError('Failed to open block log', { cause: e })
    }

    modules.logger.debug('Block log opened', {
      datadir: opts.datadir ?? 'memory',
    })
    return new DbController(modules.logger, db)
  }

  static blockKey(ordinal: number): string {
    return `${BLOCK_PREFIX}${ordinal.toString().padStart(12, '0')}`
  }

  async putBlock(id: string, json: string): Promise<void> {
    this.assertOpen()
    const ordinal = this.nextOrdinal++
    try {
      await this.db.put(DbController.blockKey(ordinal), json)
    } catch (e) {
      throw new StorageError(`Failed to persist block ${id}`, {
        cause: e,
        context: { blockId: id },
      })
    }
  }

  /**
   * Stored blocks in arrival order. New blocks are appended after the last
   * one read.
   */
  async *blocks(): AsyncGenerator<string> {
    this.assertOpen()
    for await (const [key, value] of this.db.iterator()) {
      if (!key.startsWith(BLOCK_PREFIX)) continue
      const ordinal = Number.parseInt(key.slice(BLOCK_PREFIX.length), 10)
      if (Number.isSafeInteger(ordinal) && ordinal >= this.nextOrdinal) {
        this.nextOrdinal = ordinal + 1
      }
      yield value
    }
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    if (this.status === Status.closed) return
    this.status = Status.closed
    await this.db.close()
    this.logger.debug('Block log closed')
  }

  private assertOpen(): void {
    if (this.status === Status.closed) {
      throw new StorageError('Block log is closed')
    }
  }
}
