import type { BranchTracker } from '../chain/branch-tracker'
import type { BlockRecord, Branch } from '../types'

export interface TipUpdate {
  branch: Branch
  tip: BlockRecord
}

export interface TipSubscriptionOptions {
  /** closes the subscription when aborted */
  signal?: AbortSignal
  onClose?: () => void
}

/**
 * One subscriber of the main branch tip.
 *
 * Holds at most one undelivered update: a newer tip replaces an older one
 * that was not consumed yet. Updates whose chain length is below the last
 * delivered one are dropped.
 */
export class TipSubscription implements AsyncIterableIterator<TipUpdate> {
  private latest: TipUpdate | undefined
  private waiter: ((result: IteratorResult<TipUpdate>) => void) | undefined
  private deliveredLength = -1
  private closed = false
  private readonly unsubscribe: () => void
  private readonly onAbort = () => {
    this.close()
  }

  constructor(
    tracker: BranchTracker,
    private readonly opts: TipSubscriptionOptions = {},
  ) {
    const current = tracker.main
    const tip = tracker.mainTip()
    if (current !== undefined && tip !== undefined) {
      this.latest = { branch: current, tip }
    }

    const listener = (branch: Branch, tip: BlockRecord) =>
      this.push({ branch, tip })
    tracker.events.on('tip', listener)
    this.unsubscribe = () => tracker.events.off('tip', listener)

    if (opts.signal?.aborted === true) this.close()
    else opts.signal?.addEventListener('abort', this.onAbort, { once: true })
  }

  get isClosed(): boolean {
    return this.closed
  }

  private push(update: TipUpdate): void {
    if (this.closed || update.tip.chainLength < this.deliveredLength) return
    const waiter = this.waiter
    if (waiter !== undefined) {
      this.waiter = undefined
      this.deliveredLength = update.tip.chainLength
      waiter({ value: update, done: false })
      return
    }
    this.latest = update
  }

  async next(): Promise<IteratorResult<TipUpdate>> {
    if (this.closed) return { value: undefined, done: true }
    const latest = this.latest
    if (latest !== undefined) {
      this.latest = undefined
      this.deliveredLength = latest.tip.chainLength
      return { value: latest, done: false }
    }
    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }

  async return(): Promise<IteratorResult<TipUpdate>> {
    this.close()
    return { value: undefined, done: true }
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.latest = undefined
    this.unsubscribe()
    this.opts.signal?.removeEventListener('abort', this.onAbort)
    const waiter = this.waiter
    this.waiter = undefined
    waiter?.({ value: undefined, done: true })
    this.opts.onClose?.()
  }
}
