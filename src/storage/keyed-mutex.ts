/**
 * KeyedMutex - Serializes async sections per key
 *
 * Sections for the same key run one at a time, in arrival order. Sections for
 * different keys run concurrently. `withExclusive` takes every key at once:
 * it waits for the sections already holding or queued on a key, and no new
 * section starts until it finishes.
 *
 * ```typescript
 * const mutex = new KeyedMutex<string>()
 * await mutex.withLock('room1', async () => {
 *   // nothing else holds 'room1' here
 * })
 * ```
 */
export class KeyedMutex<K> {
  private tails = new Map<K, Promise<void>>()
  private exclusive: Promise<void> | null = null

  async withLock<T>(key: K, operation: () => Promise<T>): Promise<T> {
    while (this.exclusive) {
      await this.exclusive
    }

    // Registration below must happen in the same turn as the check above
    const previous = this.tails.get(key)
    let release: () => void = () => {}
    const held = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous ? previous.then(() => held) : held
    this.tails.set(key, tail)

    try {
      if (previous) {
        await previous
      }
      return await operation()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  async withExclusive<T>(operation: () => Promise<T>): Promise<T> {
    while (this.exclusive) {
      await this.exclusive
    }

    let release: () => void = () => {}
    this.exclusive = new Promise<void>((resolve) => {
      release = resolve
    })

    try {
      await Promise.all(this.tails.values())
      return await operation()
    } finally {
      this.exclusive = null
      release()
    }
  }

  /**
   * Keys with a section holding or queued
   */
  pending(): number {
    return this.tails.size
  }
}
