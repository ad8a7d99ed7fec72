/**
 * Async primitives for the board connection.
 *
 * - Mutex: single owner of the clock command channel.
 * - PendingSignal: resettable one-shot used to pair a query with the next
 *   matching response frame (the protocol has no correlation ids).
 * - BlockingQueue: write queue drained by the threaded driver's write loop.
 */

export class Mutex {
  private locked = false
  private readonly waiters: Array<(release: () => void) => void> = []

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true
      return () => this.release()
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(resolve)
    })
  }

  isLocked(): boolean {
    return this.locked
  }

  private release() {
    const next = this.waiters.shift()
    if (next) {
      // still locked, transfer ownership
      next(() => this.release())
      return
    }
    this.locked = false
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

interface SignalWaiter<T> {
  resolve: (value: T) => void
  reject: (err: Error) => void
}

type SignalSlot<T> = { state: 'clear' } | { state: 'set'; value: T } | { state: 'failed'; error: Error }

/**
 * Level-triggered, resettable completion handle.
 *
 * `set()` wakes every waiter and keeps the value until `clear()`; waits that
 * start while set resolve immediately. `fail()` rejects current waiters;
 * with `sticky` it also rejects later waits until the next `clear()`/`set()`.
 */
export class PendingSignal<T> {
  private slot: SignalSlot<T> = { state: 'clear' }
  private waiters: Array<SignalWaiter<T>> = []

  get isSet(): boolean {
    return this.slot.state === 'set'
  }

  clear(): void {
    this.slot = { state: 'clear' }
  }

  set(value: T): void {
    this.slot = { state: 'set', value }
    const waiters = this.waiters
    this.waiters = []
    for (const w of waiters) w.resolve(value)
  }

  fail(error: Error, sticky = false): void {
    if (sticky) this.slot = { state: 'failed', error }
    else if (this.slot.state === 'failed') this.slot = { state: 'clear' }
    const waiters = this.waiters
    this.waiters = []
    for (const w of waiters) w.reject(error)
  }

  wait(): Promise<T> {
    const slot = this.slot
    if (slot.state === 'set') return Promise.resolve(slot.value)
    if (slot.state === 'failed') return Promise.reject(slot.error)
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  get waiting(): number {
    return this.waiters.length
  }
}

/** Unbounded FIFO whose `take()` suspends until an item is available. */
export class BlockingQueue<T> {
  private readonly items: T[] = []
  private readonly takers: Array<(item: T) => void> = []

  put(item: T): void {
    const taker = this.takers.shift()
    if (taker) {
      taker(item)
      return
    }
    this.items.push(item)
  }

  take(): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items.shift()
      if (item !== undefined) return Promise.resolve(item)
    }
    return new Promise<T>((resolve) => this.takers.push(resolve))
  }

  /** Drop queued items; suspended takers keep waiting. */
  clear(): void {
    this.items.length = 0
  }

  get size(): number {
    return this.items.length
  }
}
