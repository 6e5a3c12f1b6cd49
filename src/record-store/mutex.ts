/**
 * Async mutex serializing the operations of one record store.
 *
 * Waiters are served in the order they called acquire(), so each
 * seek-scan-write sequence finishes before the next one starts.
 */
export class Mutex {
  private locked = false
  private waiting: Array<() => void> = []

  /**
   * Acquire the mutex. If already locked, waits until released.
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve)
    })
  }

  /**
   * Release the mutex, handing it straight to the next waiter if any.
   */
  release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
    } else {
      this.locked = false
    }
  }

  /**
   * Run `task` while holding the mutex.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }

  isLocked(): boolean {
    return this.locked
  }
}
