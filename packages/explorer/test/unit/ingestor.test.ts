import { MemoryLevel } from 'memory-level'
import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  DuplicateBlockError,
  type Explorer,
  QueryCancelledError,
  ValidationError,
} from '../../src'
import {
  blockId,
  createTestExplorer,
  linearChain,
  makeBlock,
  submitAll,
} from './fixtures'

describe('BlockIngestor', () => {
  const explorers: Explorer[] = []
  const open = async (...args: Parameters<typeof createTestExplorer>) => {
    const explorer = await createTestExplorer(...args)
    explorers.push(explorer)
    return explorer
  }

  afterEach(async () => {
    for (const explorer of explorers.splice(0)) await explorer.close()
  })

  it('should link blocks and report them', async () => {
    const explorer = await open()
    const linked: string[] = []
    explorer.ingestor.events.on('block', (record) => linked.push(record.id))

    const results = await Promise.all(
      linearChain(0, 2).map((block) => explorer.submit(block)),
    )

    expect(results).toEqual(['linked', 'linked', 'linked'])
    expect(linked).toEqual([blockId(0), blockId(1), blockId(2)])
    expect(explorer.store.blockCount).toBe(3)
    const [ingested] = (await explorer.metrics.index.blocksIngested.get())
      .values
    expect(ingested.value).toBe(3)
  })

  it('should buffer blocks until their parent arrives', async () => {
    const explorer = await open()
    const orphans: Array<[string, string]> = []
    explorer.ingestor.events.on('orphan', (id, parent) =>
      orphans.push([id, parent]),
    )

    expect(await explorer.submit(makeBlock(2, 1))).toBe('buffered')
    expect(await explorer.submit(makeBlock(2, 1))).toBe('buffered')
    expect(explorer.ingestor.orphanCount).toBe(1)
    expect(orphans).toEqual([[blockId(2), blockId(1)]])

    await explorer.submit(makeBlock(0, null))
    expect(await explorer.submit(makeBlock(1, 0))).toBe('linked')

    expect(explorer.ingestor.orphanCount).toBe(0)
    expect(explorer.store.hasBlock(blockId(2))).toBe(true)
    expect(explorer.tracker.main?.tipId).toBe(blockId(2))
  })

  it('should drop the oldest orphan when the buffer is full', async () => {
    const explorer = await open({ orphanBufferLimit: 2 })

    await explorer.submit(makeBlock(5, 4))
    await explorer.submit(makeBlock(6, 4))
    await explorer.submit(makeBlock(7, 4))
    expect(explorer.ingestor.orphanCount).toBe(2)

    await submitAll(explorer, linearChain(0, 4))

    expect(explorer.store.hasBlock(blockId(5))).toBe(false)
    expect(explorer.store.hasBlock(blockId(6))).toBe(true)
    expect(explorer.store.hasBlock(blockId(7))).toBe(true)
  })

  it('should keep a buffered block whose write fails', async () => {
    const explorer = await open()
    await explorer.submit(makeBlock(0, null))
    await explorer.submit(makeBlock(2, 1))
    await explorer.submit(makeBlock(3, 2))

    const putBlock = explorer.db.putBlock.bind(explorer.db)
    const failing = vi
      .spyOn(explorer.db, 'putBlock')
      .mockImplementation(async (id, json) => {
        if (id === blockId(2)) throw new Error('disk full')
        return putBlock(id, json)
      })

    expect(await explorer.submit(makeBlock(1, 0))).toBe('linked')
    expect(explorer.store.hasBlock(blockId(1))).toBe(true)
    expect(explorer.store.hasBlock(blockId(2))).toBe(false)
    expect(explorer.ingestor.orphanCount).toBe(2)

    failing.mockRestore()
    expect(await explorer.submit(makeBlock(2, 1))).toBe('linked')
    expect(explorer.ingestor.orphanCount).toBe(0)
    expect(explorer.tracker.main?.tipId).toBe(blockId(3))
  })

  it('should accept a repeated block and refuse a conflicting one', async () => {
    const explorer = await open()
    await explorer.submit(makeBlock(0, null))

    expect(await explorer.submit(makeBlock(0, null))).toBe('duplicate')
    await expect(
      explorer.submit(makeBlock(0, null, { date: { epoch: 5, slot: 0 } })),
    ).rejects.toThrow(DuplicateBlockError)
    expect(explorer.store.blockCount).toBe(1)
  })

  it('should quarantine blocks forking below the confirmed point', async () => {
    const explorer = await open({ epochStabilityDepth: 1, retentionWindow: 1 })
    const quarantined: string[] = []
    explorer.ingestor.events.on('quarantine', (id) => quarantined.push(id))

    await submitAll(explorer, linearChain(0, 3))
    expect(explorer.tracker.confirmedLength).toBe(2)

    expect(await explorer.submit(makeBlock(9, 1))).toBe('quarantined')
    expect(await explorer.submit(makeBlock(10, 9))).toBe('quarantined')

    expect(await explorer.submit(makeBlock(12, 11))).toBe('buffered')
    expect(await explorer.submit(makeBlock(11, 1))).toBe('quarantined')

    expect(quarantined).toEqual([
      blockId(9),
      blockId(10),
      blockId(11),
      blockId(12),
    ])
    expect(explorer.ingestor.isQuarantined(blockId(12))).toBe(true)
    expect(explorer.ingestor.orphanCount).toBe(0)
    expect(explorer.store.hasBlock(blockId(9))).toBe(false)
    expect(explorer.tracker.main?.tipId).toBe(blockId(3))
  })

  it('should rebuild the same index from the block log', async () => {
    const db = new MemoryLevel<string, string>({ valueEncoding: 'utf8' })
    const first = await open({ db })
    await submitAll(first, [
      ...linearChain(0, 2),
      makeBlock(3, 1),
      makeBlock(4, 3),
    ])

    const second = await open({ db })

    expect(second.store.blockCount).toBe(5)
    expect(second.tracker.main).toEqual(first.tracker.main)
    expect(second.tracker.main?.id).toBe(blockId(3))
    expect(second.tracker.liveBranches()).toEqual(
      first.tracker.liveBranches(),
    )
    expect(second.tracker.confirmedLength).toBe(first.tracker.confirmedLength)

    expect(await second.submit(makeBlock(5, 4))).toBe('linked')
    const third = await open({ db })
    expect(third.tracker.main?.tipId).toBe(blockId(5))
  })

  describe('run', () => {
    async function* feed(values: unknown[]) {
      for (const value of values) yield value
    }

    it('should index every element of the feed', async () => {
      const explorer = await open()
      await explorer.run(feed(linearChain(0, 3)))
      expect(explorer.tracker.main?.tipId).toBe(blockId(3))
    })

    it('should stop at an element that does not decode', async () => {
      const explorer = await open()
      await expect(
        explorer.run(feed([makeBlock(0, null), { id: 'bad' }, makeBlock(1, 0)])),
      ).rejects.toThrow(ValidationError)
      expect(explorer.store.blockCount).toBe(1)
    })

    it('should stop when aborted', async () => {
      const explorer = await open()
      const controller = new AbortController()
      controller.abort()
      await expect(
        explorer.run(feed(linearChain(0, 1)), controller.signal),
      ).rejects.toThrow(QueryCancelledError)
      expect(explorer.store.blockCount).toBe(0)
    })
  })
})
