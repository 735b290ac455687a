/**
 * Single-permit async semaphore.
 *
 * `acquire` resolves immediately while the permit is free, otherwise the
 * caller is queued and resumed in FIFO order by `release`.
 */
export class Lock {
  private permits = 1
  private promiseResolverQueue: Array<(v: boolean) => void> = []

  async acquire(): Promise<boolean> {
    if (this.permits > 0) {
      this.permits -= 1
      return true
    }
    return new Promise<boolean>((resolve) =>
      this.promiseResolverQueue.push(resolve),
    )
  }

  release(): void {
    const nextResolver = this.promiseResolverQueue.shift()
    if (nextResolver !== undefined) {
      // hand the permit straight to the next waiter
      nextResolver(true)
      return
    }
    this.permits = Math.min(this.permits + 1, 1)
  }

  get isLocked(): boolean {
    return this.permits === 0
  }

  get pending(): number {
    return this.promiseResolverQueue.length
  }

  async runExclusive<T>(action: () => Promise<T> | T): Promise<T> {
    await this.acquire()
    try {
      return await action()
    } finally {
      this.release()
    }
  }
}
