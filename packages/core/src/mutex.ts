/**
 * Async mutual exclusion.
 *
 * A holder releases by calling the function `acquire()` resolves to; waiters
 * are handed the lock in arrival order.
 */
export class Mutex {
  #locked = false
  readonly #waitQueue: Array<() => void> = []

  get isLocked(): boolean {
    return this.#locked
  }

  /** Number of callers blocked on the lock */
  get waiting(): number {
    return this.#waitQueue.length
  }

  acquire(): Promise<() => void> {
    if (!this.#locked) {
      this.#locked = true
      return Promise.resolve(this.#releaser())
    }
    return new Promise((resolve) => {
      this.#waitQueue.push(() => resolve(this.#releaser()))
    })
  }

  async runExclusive<T>(fn: () => T | PromiseLike<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  #releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.#waitQueue.shift()
      if (next) next()
      else this.#locked = false
    }
  }
}

/** One Mutex per key, created on demand and dropped once idle */
export class KeyedMutex<K> {
  readonly #locks = new Map<K, Mutex>()

  get size(): number {
    return this.#locks.size
  }

  async runExclusive<T>(key: K, fn: () => T | PromiseLike<T>): Promise<T> {
    let mutex = this.#locks.get(key)
    if (!mutex) {
      mutex = new Mutex()
      this.#locks.set(key, mutex)
    }
    try {
      return await mutex.runExclusive(fn)
    } finally {
      if (!mutex.isLocked && mutex.waiting === 0) this.#locks.delete(key)
    }
  }
}
