import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Explorer } from '../../src'
import { blockId, createTestExplorer, makeBlock } from './fixtures'

describe('TipSubscription', () => {
  let explorer: Explorer

  beforeEach(async () => {
    explorer = await createTestExplorer()
    await explorer.submit(makeBlock(0, null))
  })

  afterEach(async () => {
    await explorer.close()
  })

  const nextTip = async (
    iterator: AsyncIterator<{ tip: { id: string } }>,
  ): Promise<string | undefined> => {
    const result = await iterator.next()
    return result.done === true ? undefined : result.value.tip.id
  }

  it('should start with the current main tip', async () => {
    const subscription = explorer.query.subscribeTip()
    expect(await nextTip(subscription)).toBe(blockId(0))
    subscription.close()
  })

  it('should deliver only the newest undelivered tip', async () => {
    const subscription = explorer.query.subscribeTip()
    await nextTip(subscription)

    await explorer.submit(makeBlock(1, 0))
    await explorer.submit(makeBlock(2, 1))
    await explorer.submit(makeBlock(3, 2))

    expect(await nextTip(subscription)).toBe(blockId(3))
    subscription.close()
  })

  it('should wake a waiting consumer on a new tip', async () => {
    const subscription = explorer.query.subscribeTip()
    await nextTip(subscription)

    const pending = nextTip(subscription)
    await explorer.submit(makeBlock(1, 0))

    expect(await pending).toBe(blockId(1))
    subscription.close()
  })

  it('should follow a switch to another branch', async () => {
    await explorer.submit(makeBlock(1, 0))
    const subscription = explorer.query.subscribeTip()
    await nextTip(subscription)

    await explorer.submit(makeBlock(2, 0))
    await explorer.submit(makeBlock(3, 2))

    const result = await subscription.next()
    expect(result.done).toBe(false)
    if (result.done !== true) {
      expect(result.value.branch.id).toBe(blockId(2))
      expect(result.value.tip.id).toBe(blockId(3))
    }
    subscription.close()
  })

  it('should end when closed or aborted', async () => {
    const onClose = vi.fn()
    const listeners = explorer.tracker.events.listenerCount('tip')
    const subscription = explorer.query.subscribeTip({ onClose })
    await nextTip(subscription)

    const pending = subscription.next()
    subscription.close()
    expect(await pending).toEqual({ value: undefined, done: true })
    expect(onClose).toHaveBeenCalledOnce()
    expect(explorer.tracker.events.listenerCount('tip')).toBe(listeners)

    const controller = new AbortController()
    const aborted = explorer.query.subscribeTip({ signal: controller.signal })
    controller.abort()
    expect(aborted.isClosed).toBe(true)
    expect(await nextTip(aborted)).toBeUndefined()
  })

  it('should stop a for-await loop on break', async () => {
    const subscription = explorer.query.subscribeTip()
    for await (const update of subscription) {
      expect(update.tip.id).toBe(blockId(0))
      break
    }
    expect(subscription.isClosed).toBe(true)
  })
})
